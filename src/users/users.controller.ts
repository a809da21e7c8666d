import { Body, Controller, Get, Patch, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { UsersService } from './users.service';
import { toProfile } from './user-profile';
import { UpdateProfileDto } from './dto/update-profile.dto';
import { ReminderPreferencesDto } from './dto/reminder-preferences.dto';
import { CurrentUser } from '../auth/current-user.decorator';
import { AuthUser } from '../auth/auth-user';
import { validateInput } from '../common/validate';

@UseGuards(AuthGuard('jwt'))
@Controller('users/me')
export class UsersController {
  constructor(private readonly users: UsersService) {}

  @Get()
  async me(@CurrentUser() auth: AuthUser) {
    const user = await this.users.requireActive(auth.userId);
    return toProfile(user);
  }

  @Patch()
  async update(@CurrentUser() auth: AuthUser, @Body() body: UpdateProfileDto) {
    const dto = await validateInput(UpdateProfileDto, body);
    const user = await this.users.requireActive(auth.userId);
    await this.users.updateProfile(user, dto);
    return toProfile(await this.users.requireById(user.id));
  }

  @Patch('reminders')
  async reminders(@CurrentUser() auth: AuthUser, @Body() body: ReminderPreferencesDto) {
    const dto = await validateInput(ReminderPreferencesDto, body);
    const user = await this.users.requireActive(auth.userId);
    const saved = await this.users.updateReminderPreferences(user, dto);
    return {
      enabled: saved.reminderEnabled,
      leadHours: saved.reminderLeadHours,
      email: saved.reminderEmail ?? null,
    };
  }
}
