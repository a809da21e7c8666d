import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsEmail,
  IsIn,
  IsInt,
  IsISO8601,
  IsOptional,
  IsString,
  IsUUID,
  Matches,
  MaxLength,
  Min,
  MinLength,
  ValidateNested,
} from 'class-validator';
import { COURSE_LEVELS, CourseLevel } from '../../courses/course.entity';
import { MACHINE_STATUSES, MachineStatus } from '../../machines/machine.entity';
import { USER_ROLES, UserRole } from '../../users/user.entity';

const DAY = /^\d{4}-\d{2}-\d{2}$/;
const CLOCK = /^\d{2}:\d{2}$/;

export class ImportedBuildingDto {
  @IsUUID()
  id!: string;

  @IsString() @MinLength(1) @MaxLength(100)
  name!: string;

  @IsOptional() @IsString() @MaxLength(20)
  code?: string | null;
}

export class ImportedCourseDto {
  @IsUUID()
  id!: string;

  @IsString() @MinLength(1) @MaxLength(20)
  code!: string;

  @IsString() @MinLength(1) @MaxLength(100)
  name!: string;

  @IsOptional() @IsString() @MaxLength(50)
  shortName?: string | null;

  @IsIn(COURSE_LEVELS)
  level!: CourseLevel;

  @IsOptional() @IsString() @MaxLength(100)
  department?: string | null;

  @IsOptional() @IsInt() @Min(1)
  durationYears?: number | null;

  @IsBoolean()
  isActive!: boolean;
}

export class ImportedTimeRangeDto {
  @Matches(CLOCK)
  start!: string;

  @Matches(CLOCK)
  end!: string;
}

export class ImportedMachineDto {
  @IsUUID()
  id!: string;

  @IsString() @MinLength(1) @MaxLength(100)
  name!: string;

  @IsString() @MinLength(1) @MaxLength(20)
  code!: string;

  @IsUUID()
  buildingId!: string;

  @IsIn(MACHINE_STATUSES)
  status!: MachineStatus;

  @IsInt() @Min(1)
  slotCount!: number;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ImportedTimeRangeDto)
  slotTemplate!: ImportedTimeRangeDto[];
}

export class ImportedUserDto {
  @IsUUID()
  id!: string;

  @IsString() @MinLength(1) @MaxLength(100)
  username!: string;

  @IsString() @MinLength(1) @MaxLength(50)
  firstName!: string;

  @IsOptional() @IsString() @MaxLength(50)
  middleName?: string | null;

  @IsOptional() @IsString() @MaxLength(50)
  lastName?: string | null;

  @IsEmail()
  email!: string;

  // exports leave hashes out; present only in hand-made payloads
  @IsOptional() @IsString() @MinLength(20)
  passwordHash?: string | null;

  @IsIn(USER_ROLES)
  role!: UserRole;

  @IsUUID()
  buildingId!: string;

  @IsOptional() @IsUUID()
  courseId?: string | null;

  @IsOptional() @IsString() @MaxLength(20)
  contactNo?: string | null;

  @IsOptional() @IsString() @MaxLength(20)
  roomNo?: string | null;

  @IsOptional() @IsString() @MaxLength(120)
  hostName?: string | null;

  @IsOptional() @Matches(DAY)
  departureDate?: string | null;

  @IsBoolean()
  isActive!: boolean;

  @IsISO8601()
  createdAt!: string;
}

export class ImportedBookingDto {
  @IsUUID()
  id!: string;

  @IsUUID()
  machineId!: string;

  @IsUUID()
  userId!: string;

  @Matches(DAY)
  date!: string;

  @IsInt() @Min(1)
  slotNumber!: number;

  @IsISO8601()
  createdAt!: string;
}

export class ImportedEnrolledStudentDto {
  @IsUUID()
  id!: string;

  @IsString() @MinLength(1) @MaxLength(120)
  fullName!: string;

  @IsEmail()
  email!: string;
}

/** The document `GET /reports/export.json` produces. */
export class DataImportDto {
  @IsArray() @ValidateNested({ each: true }) @Type(() => ImportedBuildingDto)
  buildings!: ImportedBuildingDto[];

  @IsArray() @ValidateNested({ each: true }) @Type(() => ImportedCourseDto)
  courses!: ImportedCourseDto[];

  @IsArray() @ValidateNested({ each: true }) @Type(() => ImportedMachineDto)
  machines!: ImportedMachineDto[];

  @IsArray() @ValidateNested({ each: true }) @Type(() => ImportedUserDto)
  users!: ImportedUserDto[];

  @IsArray() @ValidateNested({ each: true }) @Type(() => ImportedBookingDto)
  bookings!: ImportedBookingDto[];

  @IsArray() @ValidateNested({ each: true }) @Type(() => ImportedEnrolledStudentDto)
  enrolledStudents!: ImportedEnrolledStudentDto[];
}
