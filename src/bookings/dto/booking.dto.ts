import { Transform, Type } from 'class-transformer';
import { IsBoolean, IsInt, IsOptional, IsUUID, Matches, Max, Min } from 'class-validator';

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

export class SlotCoordinatesDto {
  @IsUUID()
  machineId!: string;

  @Matches(ISO_DAY)
  date!: string;

  @IsInt()
  @Min(1)
  slotNumber!: number;
}

export class CalendarQueryDto {
  @Type(() => Number)
  @IsInt()
  @Min(2000)
  @Max(2100)
  year!: number;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(12)
  month!: number;

  @IsOptional()
  @Transform(({ value }) => value === true || value === 'true' || value === '1')
  @IsBoolean()
  excludePast?: boolean;
}

export class DayQueryDto {
  @Matches(ISO_DAY)
  date!: string;
}

export class UserBookingsQueryDto {
  @IsOptional()
  @Transform(({ value }) => value === true || value === 'true' || value === '1')
  @IsBoolean()
  includePast?: boolean;
}
