import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { BuildingsService } from '../buildings/buildings.service';
import { CoursesService } from '../courses/courses.service';
import { EnrolledStudentsService } from '../enrolled-students/enrolled-students.service';
import { Requires } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { validateInput } from '../common/validate';
import {
  BuildingDto,
  CourseDto,
  EnrollStudentDto,
  ImportStudentsDto,
  UpdateBuildingDto,
  UpdateCourseDto,
} from './dto/admin.dto';

// buildings, courses and the enrolment list
@UseGuards(AuthGuard('jwt'), RolesGuard)
@Requires('administer')
@Controller('admin')
export class AdminDirectoryController {
  constructor(
    private readonly buildings: BuildingsService,
    private readonly courses: CoursesService,
    private readonly students: EnrolledStudentsService,
  ) {}

  @Get('buildings')
  listBuildings() {
    return this.buildings.list();
  }

  @Post('buildings')
  async createBuilding(@Body() body: BuildingDto) {
    const dto = await validateInput(BuildingDto, body);
    return this.buildings.create(dto.name, dto.code);
  }

  @Patch('buildings/:id')
  async updateBuilding(@Param('id', ParseUUIDPipe) id: string, @Body() body: UpdateBuildingDto) {
    const dto = await validateInput(UpdateBuildingDto, body);
    return this.buildings.update(id, dto);
  }

  @Delete('buildings/:id')
  async removeBuilding(@Param('id', ParseUUIDPipe) id: string) {
    await this.buildings.remove(id);
    return { ok: true };
  }

  @Get('courses')
  listCourses() {
    return this.courses.list();
  }

  @Post('courses')
  async createCourse(@Body() body: CourseDto) {
    const dto = await validateInput(CourseDto, body);
    return this.courses.create(dto);
  }

  @Patch('courses/:id')
  async updateCourse(@Param('id', ParseUUIDPipe) id: string, @Body() body: UpdateCourseDto) {
    const dto = await validateInput(UpdateCourseDto, body);
    return this.courses.update(id, dto);
  }

  @Delete('courses/:id')
  async removeCourse(@Param('id', ParseUUIDPipe) id: string) {
    await this.courses.remove(id);
    return { ok: true };
  }

  @Get('enrolled-students')
  listStudents() {
    return this.students.list();
  }

  @Post('enrolled-students')
  async enroll(@Body() body: EnrollStudentDto) {
    const dto = await validateInput(EnrollStudentDto, body);
    return this.students.add(dto.fullName, dto.email);
  }

  @Post('enrolled-students/import')
  async importStudents(@Body() body: ImportStudentsDto) {
    const dto = await validateInput(ImportStudentsDto, body);
    return this.students.importList(dto.text);
  }

  @Delete('enrolled-students/:id')
  async removeStudent(@Param('id', ParseUUIDPipe) id: string) {
    await this.students.remove(id);
    return { ok: true };
  }
}
