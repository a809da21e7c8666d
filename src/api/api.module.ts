import { Module } from '@nestjs/common';
import { ApiV1Controller } from './api-v1.controller';
import { AuthModule } from '../auth/auth.module';
import { BuildingsModule } from '../buildings/buildings.module';
import { MachinesModule } from '../machines/machines.module';
import { BookingsModule } from '../bookings/bookings.module';
import { UsersModule } from '../users/users.module';
import { ReportsModule } from '../reports/reports.module';

@Module({
  imports: [AuthModule, BuildingsModule, MachinesModule, BookingsModule, UsersModule, ReportsModule],
  controllers: [ApiV1Controller],
})
export class ApiModule {}
