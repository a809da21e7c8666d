import { IsString, MaxLength, MinLength } from 'class-validator';

export class LoginDto {
  // username or email
  @IsString()
  @MinLength(3)
  @MaxLength(160)
  login!: string;

  @IsString()
  @MinLength(6)
  password!: string;
}
