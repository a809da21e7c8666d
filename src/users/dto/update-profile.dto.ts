import { IsEmail, IsOptional, IsString, IsUUID, MaxLength, MinLength } from 'class-validator';

export class UpdateProfileDto {
  @IsOptional() @IsString() @MinLength(1) @MaxLength(50)
  firstName?: string;

  @IsOptional() @IsString() @MaxLength(50)
  middleName?: string | null;

  @IsOptional() @IsString() @MaxLength(50)
  lastName?: string | null;

  @IsOptional() @IsEmail()
  email?: string;

  @IsOptional() @IsString() @MaxLength(20)
  contactNo?: string | null;

  @IsOptional() @IsString() @MaxLength(20)
  roomNo?: string | null;

  @IsOptional() @IsUUID()
  buildingId?: string;
}
