import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fetch from 'node-fetch';
import type { TimeRange } from '../machines/machine.entity';

export type ReminderMessage = {
  bookingId: string;
  recipient: string;
  username: string;
  machine: string;
  building: string | null;
  date: string;
  timeRange: TimeRange;
  startsAt: string;
  subject: string;
  text: string;
};

/**
 * Hands a reminder to whatever delivers it. Resolves false when there is
 * nowhere to deliver to; rejects when delivery was attempted and failed.
 */
export abstract class ReminderNotifier {
  abstract deliver(message: ReminderMessage): Promise<boolean>;
}

@Injectable()
export class WebhookReminderNotifier extends ReminderNotifier {
  private readonly log = new Logger(WebhookReminderNotifier.name);
  private readonly url: string | null;

  constructor(cfg: ConfigService) {
    super();
    this.url = cfg.get<string>('REMINDER_WEBHOOK_URL')?.trim() || null;
    if (!this.url) this.log.warn('REMINDER_WEBHOOK_URL is not set; reminders will not be delivered');
  }

  async deliver(message: ReminderMessage) {
    if (!this.url) return false;
    const res = await fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(message),
    });
    if (!res.ok) throw new Error(`reminder webhook responded ${res.status}`);
    return true;
  }
}
