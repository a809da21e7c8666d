import { BadRequestException, ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Course, CourseLevel } from './course.entity';
import { User } from '../users/user.entity';

export type CourseInput = {
  code: string;
  name: string;
  level: CourseLevel;
  department: string;
  shortName?: string | null;
  durationYears?: number | null;
  description?: string | null;
  isActive?: boolean;
};

@Injectable()
export class CoursesService {
  private readonly log = new Logger(CoursesService.name);

  constructor(
    @InjectRepository(Course) private readonly courses: Repository<Course>,
    @InjectRepository(User) private readonly users: Repository<User>,
  ) {}

  list(activeOnly = false) {
    return this.courses.find({
      where: activeOnly ? { isActive: true } : {},
      order: { code: 'ASC' },
    });
  }

  async get(id: string) {
    const course = await this.courses.findOne({ where: { id } });
    if (!course) throw new NotFoundException('course_not_found');
    return course;
  }

  async create(input: CourseInput) {
    const code = input.code.trim();
    if (await this.courses.findOne({ where: { code } })) {
      throw new BadRequestException('course_code_taken');
    }
    const course = this.courses.create({
      code,
      name: input.name.trim(),
      level: input.level,
      department: input.department.trim(),
      shortName: input.shortName?.trim() || null,
      durationYears: input.durationYears ?? null,
      description: input.description?.trim() || null,
      isActive: input.isActive ?? true,
    });
    const saved = await this.courses.save(course);
    this.log.log(`Course ${saved.code} created`);
    return saved;
  }

  async update(id: string, patch: Partial<CourseInput>) {
    const course = await this.get(id);
    if (patch.code !== undefined && patch.code.trim() !== course.code) {
      const code = patch.code.trim();
      if (await this.courses.findOne({ where: { code } })) {
        throw new BadRequestException('course_code_taken');
      }
      course.code = code;
    }
    if (patch.name !== undefined) course.name = patch.name.trim();
    if (patch.level !== undefined) course.level = patch.level;
    if (patch.department !== undefined) course.department = patch.department.trim();
    if (patch.shortName !== undefined) course.shortName = patch.shortName?.trim() || null;
    if (patch.durationYears !== undefined) course.durationYears = patch.durationYears;
    if (patch.description !== undefined) course.description = patch.description?.trim() || null;
    if (patch.isActive !== undefined) course.isActive = patch.isActive;
    return this.courses.save(course);
  }

  async remove(id: string) {
    const course = await this.get(id);
    const enrolled = await this.users.count({ where: { course: { id } } });
    if (enrolled > 0) throw new ConflictException('course_in_use');
    await this.courses.delete({ id: course.id });
    this.log.log(`Course ${course.code} deleted`);
  }
}
