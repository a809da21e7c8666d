import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Booking } from './booking.entity';
import { Machine } from '../machines/machine.entity';
import { BookingsService } from './bookings.service';
import { CalendarService } from './calendar.service';
import { BookingsController } from './bookings.controller';
import { MachineCalendarController } from './machine-calendar.controller';
import { UsersModule } from '../users/users.module';
import { EventLogModule } from '../event-log/event-log.module';

@Module({
  imports: [TypeOrmModule.forFeature([Booking, Machine]), UsersModule, EventLogModule],
  providers: [BookingsService, CalendarService],
  controllers: [BookingsController, MachineCalendarController],
  exports: [BookingsService, CalendarService],
})
export class BookingsModule {}
