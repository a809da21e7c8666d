import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
} from '@nestjs/common';

export class SlotAlreadyBookedError extends ConflictException {
  constructor() {
    super('slot_already_booked');
  }
}

export class PastDateError extends BadRequestException {
  constructor() {
    super('past_date');
  }
}

export class AdvanceLimitExceededError extends BadRequestException {
  constructor(readonly horizonDays: number) {
    super('advance_limit_exceeded');
  }
}

export class MachineUnavailableError extends ConflictException {
  constructor() {
    super('machine_unavailable');
  }
}

export class BookingNotFoundError extends NotFoundException {
  constructor() {
    super('booking_not_found');
  }
}

export class NotAuthorizedError extends ForbiddenException {
  constructor() {
    super('not_authorized');
  }
}

export class InvalidSlotNumberError extends BadRequestException {
  constructor() {
    super('invalid_slot_number');
  }
}

export class InvalidDateError extends BadRequestException {
  constructor() {
    super('invalid_date');
  }
}
