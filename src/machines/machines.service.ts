import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { In, MoreThanOrEqual, Not, Repository } from 'typeorm';
import { Machine, MachineStatus, TimeRange } from './machine.entity';
import { Building } from '../buildings/building.entity';
import { Booking } from '../bookings/booking.entity';
import { User } from '../users/user.entity';
import { can } from '../auth/roles';
import { ConfigurationError, MachineNotFoundError, SlotTemplateInUseError } from './machine.errors';
import { parseSlotTemplate } from './slot-template';
import { resolveTimezone, todayIn } from '../common/timezone';

export type CreateMachineInput = {
  name: string;
  code: string;
  buildingId: string;
  slotTemplate: string[];
  slotCount?: number;
  status?: MachineStatus;
};

export type UpdateMachineInput = Partial<CreateMachineInput>;

@Injectable()
export class MachinesService {
  private readonly log = new Logger(MachinesService.name);
  private readonly zone: string;

  constructor(
    @InjectRepository(Machine) private readonly machines: Repository<Machine>,
    @InjectRepository(Building) private readonly buildings: Repository<Building>,
    @InjectRepository(Booking) private readonly bookings: Repository<Booking>,
    cfg: ConfigService,
  ) {
    this.zone = resolveTimezone(cfg);
  }

  /** Admins see every machine; everyone else sees the working machines of their own building. */
  listFor(viewer: User) {
    if (can(viewer.role, 'administer')) {
      return this.machines.find({ order: { name: 'ASC' }, relations: { building: true } });
    }
    return this.machines.find({
      where: { building: { id: viewer.building.id }, status: Not('disabled') },
      order: { name: 'ASC' },
      relations: { building: true },
    });
  }

  listAll() {
    return this.machines.find({ order: { name: 'ASC' }, relations: { building: true } });
  }

  async get(id: string) {
    const machine = await this.machines.findOne({ where: { id }, relations: { building: true } });
    if (!machine) throw new MachineNotFoundError();
    return machine;
  }

  /** Like `get`, but a machine `listFor` hides from the viewer is reported as missing. */
  async getFor(id: string, viewer: User) {
    const machine = await this.get(id);
    if (can(viewer.role, 'administer')) return machine;
    if (machine.status === 'disabled' || machine.building.id !== viewer.building.id) {
      throw new MachineNotFoundError();
    }
    return machine;
  }

  async create(input: CreateMachineInput) {
    const name = input.name.trim();
    const code = input.code.trim().toUpperCase();
    await this.assertUnique(name, code);

    const building = await this.requireBuilding(input.buildingId);
    const template = this.templateFrom(input.slotTemplate, input.slotCount);

    const machine = this.machines.create({
      name,
      code,
      building,
      status: input.status ?? 'available',
      slotCount: template.length,
      slotTemplate: template,
    });
    const saved = await this.machines.save(machine);
    this.log.log(`Machine '${saved.name}' created in '${building.name}' with ${saved.slotCount} slots`);
    return saved;
  }

  async update(id: string, patch: UpdateMachineInput) {
    const machine = await this.get(id);
    const name = patch.name !== undefined ? patch.name.trim() : machine.name;
    const code = patch.code !== undefined ? patch.code.trim().toUpperCase() : machine.code;
    await this.assertUnique(name, code, machine.id);
    machine.name = name;
    machine.code = code;

    if (patch.buildingId !== undefined) {
      machine.building = await this.requireBuilding(patch.buildingId);
    }
    if (patch.slotTemplate !== undefined) {
      const template = this.templateFrom(patch.slotTemplate, patch.slotCount);
      await this.assertNoBookingsMoved(machine, template);
      machine.slotTemplate = template;
      machine.slotCount = template.length;
    } else if (patch.slotCount !== undefined && patch.slotCount !== machine.slotCount) {
      throw new ConfigurationError('slot_template_mismatch');
    }
    if (patch.status !== undefined) machine.status = patch.status;

    const saved = await this.machines.save(machine);
    this.log.log(`Machine '${saved.name}' updated`);
    return saved;
  }

  async setStatus(id: string, status: MachineStatus) {
    const machine = await this.get(id);
    machine.status = status;
    const saved = await this.machines.save(machine);
    this.log.log(`Machine '${saved.name}' is now ${status}`);
    return saved;
  }

  /**
   * Removes a machine nobody ever booked. A machine with bookings is only
   * disabled, so its history stays intact.
   */
  async retire(id: string) {
    const machine = await this.get(id);
    const booked = await this.bookings.count({ where: { machine: { id } } });
    if (booked > 0) {
      machine.status = 'disabled';
      await this.machines.save(machine);
      this.log.log(`Machine '${machine.name}' disabled (${booked} bookings reference it)`);
      return { deleted: false, status: machine.status };
    }
    await this.machines.delete({ id: machine.id });
    this.log.log(`Machine '${machine.name}' deleted`);
    return { deleted: true, status: null };
  }

  /** Slots that change times or disappear must have no booking from today on. */
  private async assertNoBookingsMoved(machine: Machine, next: TimeRange[]) {
    const moved = machine.slotTemplate
      .map((range, i) => ({ slotNumber: i + 1, kept: next[i]?.start === range.start && next[i]?.end === range.end }))
      .filter((slot) => !slot.kept)
      .map((slot) => slot.slotNumber);
    if (moved.length === 0) return;

    const affected = await this.bookings.count({
      where: {
        machine: { id: machine.id },
        slotNumber: In(moved),
        date: MoreThanOrEqual(todayIn(this.zone)),
      },
    });
    if (affected > 0) {
      this.log.warn(
        `Template change on '${machine.name}' refused: ${affected} upcoming bookings on slots ${moved.join(', ')}`,
      );
      throw new SlotTemplateInUseError();
    }
  }

  private templateFrom(raw: string[], slotCount?: number) {
    const template = parseSlotTemplate(raw);
    if (slotCount !== undefined && slotCount !== template.length) {
      throw new ConfigurationError('slot_template_mismatch');
    }
    return template;
  }

  private async requireBuilding(id: string) {
    const building = await this.buildings.findOne({ where: { id } });
    if (!building) throw new BadRequestException('building_not_found');
    return building;
  }

  private async assertUnique(name: string, code: string, exceptId?: string) {
    const matches = await this.machines.find({ where: [{ name }, { code }] });
    const clash = matches.find((m) => m.id !== exceptId);
    if (clash) {
      throw new BadRequestException(clash.name === name ? 'machine_name_taken' : 'machine_code_taken');
    }
  }
}
