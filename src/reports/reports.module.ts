import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ReportsController } from './reports.controller';
import { ReportsService } from './reports.service';
import { DataImportController } from './data-import.controller';
import { DataImportService } from './data-import.service';
import { Booking } from '../bookings/booking.entity';
import { Building } from '../buildings/building.entity';
import { Course } from '../courses/course.entity';
import { EnrolledStudent } from '../enrolled-students/enrolled-student.entity';
import { Machine } from '../machines/machine.entity';
import { User } from '../users/user.entity';
import { EventLogModule } from '../event-log/event-log.module';

@Module({
  imports: [TypeOrmModule.forFeature([Booking, Building, Course, EnrolledStudent, Machine, User]), EventLogModule],
  providers: [ReportsService, DataImportService],
  controllers: [ReportsController, DataImportController],
  exports: [ReportsService],
})
export class ReportsModule {}
