import { Module } from '@nestjs/common';
import { AdminUsersController } from './admin-users.controller';
import { AdminMachinesController } from './admin-machines.controller';
import { AdminDirectoryController } from './admin-directory.controller';
import { AdminApiTokensController } from './admin-api-tokens.controller';
import { AuthModule } from '../auth/auth.module';
import { UsersModule } from '../users/users.module';
import { BookingsModule } from '../bookings/bookings.module';
import { MachinesModule } from '../machines/machines.module';
import { BuildingsModule } from '../buildings/buildings.module';
import { CoursesModule } from '../courses/courses.module';
import { EnrolledStudentsModule } from '../enrolled-students/enrolled-students.module';
import { EventLogModule } from '../event-log/event-log.module';

@Module({
  imports: [
    AuthModule,
    UsersModule,
    BookingsModule,
    MachinesModule,
    BuildingsModule,
    CoursesModule,
    EnrolledStudentsModule,
    EventLogModule,
  ],
  controllers: [
    AdminUsersController,
    AdminMachinesController,
    AdminDirectoryController,
    AdminApiTokensController,
  ],
})
export class AdminModule {}
