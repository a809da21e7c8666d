import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ScheduleModule } from '@nestjs/schedule';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { ENTITIES } from './database/entities';
import { UsersModule } from './users/users.module';
import { AuthModule } from './auth/auth.module';
import { BuildingsModule } from './buildings/buildings.module';
import { CoursesModule } from './courses/courses.module';
import { EnrolledStudentsModule } from './enrolled-students/enrolled-students.module';
import { MachinesModule } from './machines/machines.module';
import { BookingsModule } from './bookings/bookings.module';
import { RemindersModule } from './reminders/reminders.module';
import { EventLogModule } from './event-log/event-log.module';
import { ReportsModule } from './reports/reports.module';
import { AdminModule } from './admin/admin.module';
import { ApiModule } from './api/api.module';

@Module({
  imports: [
    ThrottlerModule.forRoot([
      {
        ttl: 60_000,
        limit: 60, // per IP
      },
    ]),
    ConfigModule.forRoot({ isGlobal: true, envFilePath: ['config.env', '.env'] }),
    ScheduleModule.forRoot(),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => ({
        type: 'postgres',
        url: cfg.getOrThrow<string>('DATABASE_URL'),
        entities: ENTITIES,
        // schema changes in production go through migrations
        synchronize: cfg.get<string>('DB_SYNCHRONIZE') === 'true',
        ssl: cfg.get<string>('DATABASE_SSL') === 'true' ? { rejectUnauthorized: false } : false,
      }),
    }),
    EventLogModule,
    UsersModule,
    AuthModule,
    BuildingsModule,
    CoursesModule,
    EnrolledStudentsModule,
    MachinesModule,
    BookingsModule,
    RemindersModule,
    ReportsModule,
    AdminModule,
    ApiModule,
  ],
  providers: [{ provide: APP_GUARD, useClass: ThrottlerGuard }],
})
export class AppModule {}
