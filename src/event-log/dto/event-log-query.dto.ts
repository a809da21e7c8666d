import { Type } from 'class-transformer';
import { IsIn, IsInt, IsISO8601, IsOptional, IsUUID, Max, Min } from 'class-validator';
import {
  EVENT_ACTIONS,
  EVENT_CATEGORIES,
  EVENT_OUTCOMES,
  EventAction,
  EventCategory,
  EventOutcome,
} from '../event-log.entity';
import { MAX_AUDIT_PAGE } from '../event-log.service';

export class EventLogQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_AUDIT_PAGE)
  limit?: number;

  @IsOptional()
  @IsIn(EVENT_CATEGORIES)
  category?: EventCategory;

  @IsOptional()
  @IsIn(EVENT_ACTIONS)
  action?: EventAction;

  @IsOptional()
  @IsIn(EVENT_OUTCOMES)
  outcome?: EventOutcome;

  @IsOptional()
  @IsUUID()
  userId?: string;

  @IsOptional()
  @IsISO8601()
  since?: string;
}
