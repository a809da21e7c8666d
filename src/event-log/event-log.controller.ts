import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { Requires } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { validateInput } from '../common/validate';
import { fullNameOf } from '../users/user-profile';
import { EventLogQueryDto } from './dto/event-log-query.dto';
import { EventLogService, describeEvent } from './event-log.service';

@UseGuards(AuthGuard('jwt'), RolesGuard)
@Requires('administer')
@Controller('admin/event-logs')
export class EventLogController {
  constructor(private readonly audit: EventLogService) {}

  /** Newest first; `?category=booking&outcome=error&since=2025-06-01` narrows it down. */
  @Get()
  async list(@Query() query: Record<string, string>) {
    const dto = await validateInput(EventLogQueryDto, query, 'invalid_query');
    const events = await this.audit.search({
      category: dto.category,
      action: dto.action,
      outcome: dto.outcome,
      actorId: dto.userId,
      since: dto.since ? new Date(dto.since) : undefined,
      limit: dto.limit,
    });
    return events.map((event) => ({
      id: event.id,
      at: event.createdAt.toISOString(),
      category: event.category,
      action: event.action,
      outcome: event.outcome,
      subjectId: event.subjectId ?? null,
      summary: describeEvent(event, event.actor?.username ?? null),
      details: event.details ?? null,
      actor: event.actor
        ? { id: event.actor.id, username: event.actor.username, name: fullNameOf(event.actor) }
        : null,
    }));
  }
}
