import { Test, TestingModule } from '@nestjs/testing';
import { ScheduleModule } from '@nestjs/schedule';
import { RemindersScheduler } from './reminders.scheduler';
import { RemindersService, SweepResult } from './reminders.service';

describe('RemindersScheduler', () => {
  let moduleRef: TestingModule;
  let scheduler: RemindersScheduler;
  const result: SweepResult = { due: 2, sent: 1, undelivered: 1, failed: 0 };
  const runReminderSweep = jest.fn(async () => result);

  beforeEach(async () => {
    runReminderSweep.mockClear();
    moduleRef = await Test.createTestingModule({
      imports: [ScheduleModule.forRoot()],
      providers: [RemindersScheduler, { provide: RemindersService, useValue: { runReminderSweep } }],
    }).compile();
    await moduleRef.init();
    scheduler = moduleRef.get(RemindersScheduler);
  });

  afterEach(() => moduleRef.close());

  it('registers the hourly sweep as a running job', () => {
    const state = scheduler.state();

    expect(state.running).toBe(true);
    expect(state.nextRunAt).toEqual(expect.any(String));
  });

  it('pauses and resumes the sweep', () => {
    expect(scheduler.stop()).toEqual({ running: false, nextRunAt: null });
    expect(scheduler.stop().running).toBe(false);

    expect(scheduler.start().running).toBe(true);
    expect(scheduler.start().running).toBe(true);
  });

  it('runs one sweep on demand, even while paused', async () => {
    scheduler.stop();

    await expect(scheduler.runNow()).resolves.toEqual(result);
    expect(runReminderSweep).toHaveBeenCalledTimes(1);
  });

  it('logs a failed scheduled sweep instead of throwing', async () => {
    runReminderSweep.mockRejectedValueOnce(new Error('database offline'));

    await expect(scheduler.sweep()).resolves.toBeUndefined();
  });
});
