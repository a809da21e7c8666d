import { BadRequestException, ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Building } from './building.entity';
import { User } from '../users/user.entity';
import { Machine } from '../machines/machine.entity';

@Injectable()
export class BuildingsService {
  private readonly log = new Logger(BuildingsService.name);

  constructor(
    @InjectRepository(Building) private readonly buildings: Repository<Building>,
    @InjectRepository(User) private readonly users: Repository<User>,
    @InjectRepository(Machine) private readonly machines: Repository<Machine>,
  ) {}

  list() {
    return this.buildings.find({ order: { name: 'ASC' } });
  }

  async get(id: string) {
    const building = await this.buildings.findOne({ where: { id } });
    if (!building) throw new NotFoundException('building_not_found');
    return building;
  }

  async create(name: string, code?: string | null) {
    const trimmed = name.trim();
    const normalizedCode = code?.trim().toUpperCase() || null;
    await this.assertUnique(trimmed, normalizedCode);
    const saved = await this.buildings.save(this.buildings.create({ name: trimmed, code: normalizedCode }));
    this.log.log(`Building '${saved.name}' created`);
    return saved;
  }

  async update(id: string, patch: { name?: string; code?: string | null }) {
    const building = await this.get(id);
    const name = patch.name !== undefined ? patch.name.trim() : building.name;
    const code = patch.code !== undefined ? patch.code?.trim().toUpperCase() || null : building.code ?? null;
    await this.assertUnique(name, code, building.id);
    building.name = name;
    building.code = code;
    return this.buildings.save(building);
  }

  async remove(id: string) {
    const building = await this.get(id);
    const [residents, machines] = await Promise.all([
      this.users.count({ where: { building: { id } } }),
      this.machines.count({ where: { building: { id } } }),
    ]);
    if (residents > 0 || machines > 0) throw new ConflictException('building_in_use');
    await this.buildings.delete({ id: building.id });
    this.log.log(`Building '${building.name}' deleted`);
  }

  private async assertUnique(name: string, code: string | null, exceptId?: string) {
    const sameName = await this.buildings.findOne({ where: { name } });
    if (sameName && sameName.id !== exceptId) throw new BadRequestException('building_name_taken');
    if (code) {
      const sameCode = await this.buildings.findOne({ where: { code } });
      if (sameCode && sameCode.id !== exceptId) throw new BadRequestException('building_code_taken');
    }
  }
}
