import {
  IsEmail,
  IsIn,
  IsISO8601,
  IsOptional,
  IsString,
  IsUUID,
  Matches,
  MaxLength,
  MinLength,
} from 'class-validator';

export class RegisterDto {
  @IsString()
  @Matches(/^[a-zA-Z0-9_.]{3,30}$/)
  username!: string;

  @IsString()
  @MinLength(1)
  @MaxLength(50)
  firstName!: string;

  @IsOptional() @IsString() @MaxLength(50)
  middleName?: string;

  @IsOptional() @IsString() @MaxLength(50)
  lastName?: string;

  @IsEmail()
  email!: string;

  @IsString()
  @MinLength(6)
  password!: string;

  // residents register as "user", visitors as "guest"
  @IsIn(['user', 'guest'])
  role!: 'user' | 'guest';

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
