import { Controller, Get } from '@nestjs/common';
import { BuildingsService } from './buildings.service';

// public: the registration form needs the list before anyone is signed in
@Controller('buildings')
export class BuildingsController {
  constructor(private readonly buildings: BuildingsService) {}

  @Get()
  async list() {
    const list = await this.buildings.list();
    return list.map((b) => ({ id: b.id, name: b.name, code: b.code ?? null }));
  }
}
