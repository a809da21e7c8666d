import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Machine } from './machine.entity';
import { Building } from '../buildings/building.entity';
import { Booking } from '../bookings/booking.entity';
import { MachinesService } from './machines.service';
import { MachinesController } from './machines.controller';
import { UsersModule } from '../users/users.module';

@Module({
  imports: [TypeOrmModule.forFeature([Machine, Building, Booking]), UsersModule],
  providers: [MachinesService],
  controllers: [MachinesController],
  exports: [MachinesService],
})
export class MachinesModule {}
