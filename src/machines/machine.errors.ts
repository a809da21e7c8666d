import { ConflictException, NotFoundException, UnprocessableEntityException } from '@nestjs/common';

export type ConfigurationErrorCode = 'slot_template_mismatch' | 'invalid_slot_template';

export class ConfigurationError extends UnprocessableEntityException {
  constructor(readonly code: ConfigurationErrorCode = 'slot_template_mismatch') {
    super(code);
  }
}

export class MachineNotFoundError extends NotFoundException {
  constructor() {
    super('machine_not_found');
  }
}

/** A template edit would move or drop slots that upcoming bookings hold. */
export class SlotTemplateInUseError extends ConflictException {
  constructor() {
    super('slot_template_in_use');
  }
}
