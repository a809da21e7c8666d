import { Controller, Get, HttpCode, Post, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { RemindersScheduler } from './reminders.scheduler';
import { EventLogService } from '../event-log/event-log.service';
import { CurrentUser } from '../auth/current-user.decorator';
import { AuthUser } from '../auth/auth-user';
import { Requires } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';

@UseGuards(AuthGuard('jwt'), RolesGuard)
@Requires('administer')
@Controller('admin/reminders')
export class RemindersController {
  constructor(
    private readonly scheduler: RemindersScheduler,
    private readonly events: EventLogService,
  ) {}

  @Get()
  state() {
    return this.scheduler.state();
  }

  @Post('start')
  @HttpCode(200)
  async start(@CurrentUser() auth: AuthUser) {
    const state = this.scheduler.start();
    await this.events.record({ actorId: auth.userId, action: 'admin.reminders.start' });
    return state;
  }

  @Post('stop')
  @HttpCode(200)
  async stop(@CurrentUser() auth: AuthUser) {
    const state = this.scheduler.stop();
    await this.events.record({ actorId: auth.userId, action: 'admin.reminders.stop' });
    return state;
  }

  @Post('run')
  @HttpCode(200)
  async run(@CurrentUser() auth: AuthUser) {
    const result = await this.scheduler.runNow();
    await this.events.record({ actorId: auth.userId, action: 'admin.reminders.run', details: { ...result } });
    return result;
  }
}
