import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { FindOptionsWhere, MoreThanOrEqual, Repository } from 'typeorm';
import fetch from 'node-fetch';
import {
  EventAction,
  EventCategory,
  EventDetails,
  EventLog,
  EventOutcome,
  categoryOf,
} from './event-log.entity';
import { User } from '../users/user.entity';

export type AuditEntry = {
  actor?: Pick<User, 'id' | 'username'> | null;
  actorId?: string | null;
  action: EventAction;
  outcome?: EventOutcome;
  subjectId?: string | null;
  message?: string;
  details?: EventDetails;
};

export type AuditQuery = {
  category?: EventCategory;
  action?: EventAction;
  outcome?: EventOutcome;
  actorId?: string;
  since?: Date;
  limit?: number;
};

export const MAX_AUDIT_PAGE = 200;

type Describable = Pick<EventLog, 'action' | 'outcome' | 'message' | 'details'>;

/** One-line, human-readable account of an audit entry; used for alerts and the admin listing. */
export function describeEvent(event: Describable, actorName: string | null) {
  const who = actorName ?? 'unknown user';
  const details = event.details ?? {};
  const failed = event.outcome === 'error';
  switch (event.action) {
    case 'auth.login':
      return failed ? `Failed sign-in for ${details.login ?? who}` : `${who} signed in`;
    case 'booking.create':
      return `${who} ${failed ? 'could not book' : 'booked'} slot ${details.slotNumber} on ${details.date}`;
    case 'booking.cancel': {
      const behalf = details.onBehalf === true ? ' for another resident' : '';
      return `${who} ${failed ? 'could not cancel' : 'cancelled'} slot ${details.slotNumber} on ${details.date}${behalf}`;
    }
    default:
      return `${who}: ${event.action}${failed ? ' failed' : ''}${event.message ? ` (${event.message})` : ''}`;
  }
}

@Injectable()
export class EventLogService {
  private readonly log = new Logger(EventLogService.name);
  private readonly alertWebhook: string | null;

  constructor(
    @InjectRepository(EventLog) private readonly events: Repository<EventLog>,
    cfg: ConfigService,
  ) {
    this.alertWebhook = cfg.get<string>('ADMIN_ALERT_WEBHOOK')?.trim() || null;
  }

  /** Never throws: a failed write or alert only shows up in the log. */
  async record(entry: AuditEntry) {
    try {
      const actorId = entry.actor?.id ?? entry.actorId ?? null;
      const saved = await this.events.save(
        this.events.create({
          actor: actorId ? { id: actorId } : null,
          category: categoryOf(entry.action),
          action: entry.action,
          outcome: entry.outcome ?? 'success',
          subjectId: entry.subjectId ?? null,
          message: entry.message ?? null,
          details: entry.details ?? null,
        }),
      );
      if (saved.outcome === 'error' && this.alertWebhook) {
        await this.alert(this.alertWebhook, saved, entry.actor?.username ?? null).catch((err: unknown) => {
          this.log.debug(`Alert webhook failed: ${err instanceof Error ? err.message : err}`);
        });
      }
    } catch (error) {
      this.log.warn(`Could not record ${entry.action}: ${error instanceof Error ? error.message : error}`);
    }
  }

  search(query: AuditQuery = {}) {
    const where: FindOptionsWhere<EventLog> = {};
    if (query.category) where.category = query.category;
    if (query.action) where.action = query.action;
    if (query.outcome) where.outcome = query.outcome;
    if (query.actorId) where.actor = { id: query.actorId };
    if (query.since) where.createdAt = MoreThanOrEqual(query.since);
    return this.events.find({
      where,
      take: Math.max(1, Math.min(MAX_AUDIT_PAGE, query.limit ?? 50)),
      order: { createdAt: 'DESC' },
      relations: { actor: true },
    });
  }

  private async alert(url: string, event: EventLog, actorName: string | null) {
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        text: `[Slotify] ${describeEvent(event, actorName)}`,
        event: {
          id: event.id,
          category: event.category,
          action: event.action,
          subjectId: event.subjectId ?? null,
          details: event.details ?? null,
          at: event.createdAt.toISOString(),
        },
      }),
    });
    if (!res.ok) throw new Error(`webhook answered ${res.status}`);
  }
}
