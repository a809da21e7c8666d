import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { JwtModule } from '@nestjs/jwt';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { PassportModule } from '@nestjs/passport';
import { UsersModule } from '../users/users.module';
import { EnrolledStudentsModule } from '../enrolled-students/enrolled-students.module';
import { EventLogModule } from '../event-log/event-log.module';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { JwtStrategy } from './jwt.strategy';
import { ApiToken } from './api-token.entity';
import { ApiTokenService } from './api-token.service';
import { ApiTokenGuard } from './api-token.guard';
import { ApiTokenCleanup } from './api-token.cleanup';
import { RolesGuard } from './roles.guard';

@Module({
  imports: [
    ConfigModule,
    UsersModule,
    EnrolledStudentsModule,
    EventLogModule,
    TypeOrmModule.forFeature([ApiToken]),
    PassportModule.register({ defaultStrategy: 'jwt' }),
    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => ({
        secret: cfg.getOrThrow<string>('JWT_SECRET'),
        signOptions: { expiresIn: cfg.get<string>('JWT_ACCESS_TTL') ?? '24h' },
      }),
    }),
  ],
  providers: [AuthService, JwtStrategy, ApiTokenService, ApiTokenGuard, ApiTokenCleanup, RolesGuard],
  controllers: [AuthController],
  exports: [JwtModule, PassportModule, ApiTokenService, ApiTokenGuard, RolesGuard],
})
export class AuthModule {}
