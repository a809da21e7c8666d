import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression, SchedulerRegistry } from '@nestjs/schedule';
import { RemindersService } from './reminders.service';

export const REMINDER_SWEEP_JOB = 'reminder-sweep';

export type ReminderJobState = { running: boolean; nextRunAt: string | null };

@Injectable()
export class RemindersScheduler {
  private readonly log = new Logger(RemindersScheduler.name);

  constructor(
    private readonly reminders: RemindersService,
    private readonly registry: SchedulerRegistry,
  ) {}

  @Cron(CronExpression.EVERY_HOUR, { name: REMINDER_SWEEP_JOB })
  async sweep() {
    try {
      await this.reminders.runReminderSweep();
    } catch (error) {
      this.log.warn(`Reminder sweep failed: ${error instanceof Error ? error.message : error}`);
    }
  }

  state(): ReminderJobState {
    const job = this.registry.getCronJob(REMINDER_SWEEP_JOB);
    return { running: job.running, nextRunAt: job.running ? job.nextDate().toISO() : null };
  }

  /** Resumes the hourly sweep; a no-op when it is already running. */
  start() {
    const job = this.registry.getCronJob(REMINDER_SWEEP_JOB);
    if (!job.running) {
      job.start();
      this.log.log('Reminder sweep started');
    }
    return this.state();
  }

  /** Pauses the hourly sweep until `start` or the next restart. */
  stop() {
    const job = this.registry.getCronJob(REMINDER_SWEEP_JOB);
    if (job.running) {
      job.stop();
      this.log.log('Reminder sweep stopped');
    }
    return this.state();
  }

  /** One sweep outside the schedule; errors reach the caller. */
  runNow() {
    return this.reminders.runReminderSweep();
  }
}
