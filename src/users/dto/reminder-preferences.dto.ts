import { IsBoolean, IsEmail, IsInt, IsOptional, Max, Min, ValidateIf } from 'class-validator';
import { MAX_REMINDER_LEAD_HOURS, MIN_REMINDER_LEAD_HOURS } from '../users.service';

export class ReminderPreferencesDto {
  @IsOptional() @IsBoolean()
  enabled?: boolean;

  @IsOptional() @IsInt() @Min(MIN_REMINDER_LEAD_HOURS) @Max(MAX_REMINDER_LEAD_HOURS)
  leadHours?: number;

  // null falls back to the account email
  @ValidateIf((_o, value) => value !== null && value !== undefined)
  @IsEmail()
  email?: string | null;
}
