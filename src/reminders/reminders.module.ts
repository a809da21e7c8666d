import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Booking } from '../bookings/booking.entity';
import { EventLogModule } from '../event-log/event-log.module';
import { ReminderLog } from './reminder-log.entity';
import { RemindersService } from './reminders.service';
import { RemindersScheduler } from './reminders.scheduler';
import { RemindersController } from './reminders.controller';
import { ReminderNotifier, WebhookReminderNotifier } from './reminder.notifier';

@Module({
  imports: [TypeOrmModule.forFeature([Booking, ReminderLog]), EventLogModule],
  controllers: [RemindersController],
  providers: [
    RemindersService,
    RemindersScheduler,
    { provide: ReminderNotifier, useClass: WebhookReminderNotifier },
  ],
  exports: [RemindersService],
})
export class RemindersModule {}
