import {
  ArrayMinSize,
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
  Max,
  MaxLength,
  Min,
  MinLength,
} from 'class-validator';
import { USER_ROLES, UserRole } from '../../users/user.entity';
import { MACHINE_STATUSES, MachineStatus } from '../../machines/machine.entity';
import { COURSE_LEVELS, CourseLevel } from '../../courses/course.entity';
import { MAX_TOKEN_TTL_DAYS } from '../../auth/api-token.service';

export class AdminCreateUserDto {
  @IsString() @Matches(/^[a-zA-Z0-9_.]{3,30}$/)
  username!: string;

  @IsString() @MinLength(1) @MaxLength(50)
  firstName!: string;

  @IsOptional() @IsString() @MaxLength(50)
  middleName?: string;

  @IsOptional() @IsString() @MaxLength(50)
  lastName?: string;

  @IsEmail()
  email!: string;

  @IsString() @MinLength(6)
  password!: string;

  @IsIn(USER_ROLES)
  role!: UserRole;

  @IsUUID()
  buildingId!: string;

  @IsOptional() @IsUUID()
  courseId?: string;

  @IsOptional() @IsString() @MaxLength(20)
  contactNo?: string;

  @IsOptional() @IsString() @MaxLength(20)
  roomNo?: string;

  @IsOptional() @IsString() @MaxLength(120)
  hostName?: string;

  @IsOptional() @IsISO8601({ strict: true })
  departureDate?: string;
}

export class ChangeRoleDto {
  @IsIn(USER_ROLES)
  role!: UserRole;
}

export class SetActiveDto {
  @IsBoolean()
  isActive!: boolean;
}

export class ResetPasswordDto {
  @IsString() @MinLength(6)
  password!: string;
}

export class CreateMachineDto {
  @IsString() @MinLength(1) @MaxLength(100)
  name!: string;

  @IsString() @Matches(/^[A-Za-z0-9_-]{1,20}$/)
  code!: string;

  @IsUUID()
  buildingId!: string;

  // "HH:mm-HH:mm" per slot, in order
  @IsArray() @ArrayMinSize(1) @IsString({ each: true })
  slotTemplate!: string[];

  @IsOptional() @IsInt() @Min(1)
  slotCount?: number;

  @IsOptional() @IsIn(MACHINE_STATUSES)
  status?: MachineStatus;
}

export class UpdateMachineDto {
  @IsOptional() @IsString() @MinLength(1) @MaxLength(100)
  name?: string;

  @IsOptional() @IsString() @Matches(/^[A-Za-z0-9_-]{1,20}$/)
  code?: string;

  @IsOptional() @IsUUID()
  buildingId?: string;

  @IsOptional() @IsArray() @ArrayMinSize(1) @IsString({ each: true })
  slotTemplate?: string[];

  @IsOptional() @IsInt() @Min(1)
  slotCount?: number;

  @IsOptional() @IsIn(MACHINE_STATUSES)
  status?: MachineStatus;
}

export class MachineStatusDto {
  @IsIn(MACHINE_STATUSES)
  status!: MachineStatus;
}

export class BuildingDto {
  @IsString() @MinLength(1) @MaxLength(100)
  name!: string;

  @IsOptional() @IsString() @MaxLength(20)
  code?: string;
}

export class UpdateBuildingDto {
  @IsOptional() @IsString() @MinLength(1) @MaxLength(100)
  name?: string;

  @IsOptional() @IsString() @MaxLength(20)
  code?: string;
}

export class CourseDto {
  @IsString() @MinLength(1) @MaxLength(20)
  code!: string;

  @IsString() @MinLength(1) @MaxLength(150)
  name!: string;

  @IsIn(COURSE_LEVELS)
  level!: CourseLevel;

  @IsString() @MinLength(1) @MaxLength(100)
  department!: string;

  @IsOptional() @IsString() @MaxLength(30)
  shortName?: string;

  @IsOptional() @IsInt() @Min(1) @Max(10)
  durationYears?: number;

  @IsOptional() @IsString() @MaxLength(500)
  description?: string;

  @IsOptional() @IsBoolean()
  isActive?: boolean;
}

export class UpdateCourseDto {
  @IsOptional() @IsString() @MinLength(1) @MaxLength(20)
  code?: string;

  @IsOptional() @IsString() @MinLength(1) @MaxLength(150)
  name?: string;

  @IsOptional() @IsIn(COURSE_LEVELS)
  level?: CourseLevel;

  @IsOptional() @IsString() @MinLength(1) @MaxLength(100)
  department?: string;

  @IsOptional() @IsString() @MaxLength(30)
  shortName?: string;

  @IsOptional() @IsInt() @Min(1) @Max(10)
  durationYears?: number;

  @IsOptional() @IsString() @MaxLength(500)
  description?: string;

  @IsOptional() @IsBoolean()
  isActive?: boolean;
}

export class EnrollStudentDto {
  @IsString() @MinLength(1) @MaxLength(120)
  fullName!: string;

  @IsEmail()
  email!: string;
}

export class ImportStudentsDto {
  @IsString() @MinLength(1)
  text!: string;
}

export class IssueApiTokenDto {
  @IsUUID()
  userId!: string;

  @IsOptional() @IsInt() @Min(1) @Max(MAX_TOKEN_TTL_DAYS)
  ttlDays?: number;

  @IsOptional() @IsString() @MaxLength(80)
  label?: string;
}
