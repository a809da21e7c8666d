import { Controller, Get } from '@nestjs/common';
import { CoursesService } from './courses.service';

@Controller('courses')
export class CoursesController {
  constructor(private readonly courses: CoursesService) {}

  @Get()
  async list() {
    const list = await this.courses.list(true);
    return list.map((c) => ({ id: c.id, code: c.code, name: c.name, shortName: c.shortName ?? null, level: c.level }));
  }
}
