import {
  Body,
  Controller,
  Delete,
  ForbiddenException,
  Get,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { UsersService } from '../users/users.service';
import { User } from '../users/user.entity';
import { toProfile } from '../users/user-profile';
import { BookingsService } from '../bookings/bookings.service';
import { UserBookingsQueryDto } from '../bookings/dto/booking.dto';
import { EventLogService } from '../event-log/event-log.service';
import { CurrentUser } from '../auth/current-user.decorator';
import { AuthUser, isUserRole } from '../auth/auth-user';
import { Requires } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { can, isPrivilegedRole } from '../auth/roles';
import { validateInput } from '../common/validate';
import { AdminCreateUserDto, ChangeRoleDto, ResetPasswordDto, SetActiveDto } from './dto/admin.dto';

function toAdminView(user: User) {
  return { ...toProfile(user), isActive: user.isActive };
}

@UseGuards(AuthGuard('jwt'), RolesGuard)
@Requires('administer')
@Controller('admin/users')
export class AdminUsersController {
  constructor(
    private readonly users: UsersService,
    private readonly bookings: BookingsService,
    private readonly events: EventLogService,
  ) {}

  @Get()
  async list(@Query('role') role?: string, @Query('q') q?: string) {
    if (q?.trim()) return (await this.users.search(q)).map(toAdminView);
    const list = await this.users.list(isUserRole(role) ? role : undefined);
    return list.map(toAdminView);
  }

  @Get(':id')
  async get(@Param('id', ParseUUIDPipe) id: string) {
    return toAdminView(await this.users.requireById(id));
  }

  @Post()
  async create(@CurrentUser() auth: AuthUser, @Body() body: AdminCreateUserDto) {
    const dto = await validateInput(AdminCreateUserDto, body);
    if (isPrivilegedRole(dto.role) && !can(auth.role, 'manageAdmins')) {
      throw new ForbiddenException('superadmin_required');
    }
    const created = await this.users.create(dto);
    await this.events.record({
      actorId: auth.userId,
      action: 'admin.user.create',
      subjectId: created.id,
      details: { role: created.role },
    });
    return toAdminView(await this.users.requireById(created.id));
  }

  @Patch(':id/role')
  async changeRole(
    @CurrentUser() auth: AuthUser,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: ChangeRoleDto,
  ) {
    const dto = await validateInput(ChangeRoleDto, body);
    const actor = await this.users.requireActive(auth.userId);
    const saved = await this.users.changeRole(actor, id, dto.role);
    await this.events.record({
      actor,
      action: 'admin.user.role',
      subjectId: saved.id,
      details: { role: saved.role },
    });
    return { id: saved.id, role: saved.role };
  }

  @Patch(':id/active')
  async setActive(
    @CurrentUser() auth: AuthUser,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: SetActiveDto,
  ) {
    const dto = await validateInput(SetActiveDto, body);
    const saved = await this.users.setActive(id, dto.isActive);
    await this.events.record({
      actorId: auth.userId,
      action: 'admin.user.active',
      subjectId: saved.id,
      details: { isActive: saved.isActive },
    });
    return { id: saved.id, isActive: saved.isActive };
  }

  @Patch(':id/password')
  async resetPassword(
    @CurrentUser() auth: AuthUser,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: ResetPasswordDto,
  ) {
    const dto = await validateInput(ResetPasswordDto, body);
    await this.users.resetPassword(id, dto.password);
    await this.events.record({ actorId: auth.userId, action: 'admin.user.password', subjectId: id });
    return { ok: true };
  }

  @Delete(':id')
  async remove(@CurrentUser() auth: AuthUser, @Param('id', ParseUUIDPipe) id: string) {
    const actor = await this.users.requireActive(auth.userId);
    await this.users.remove(actor, id);
    await this.events.record({
      actor,
      action: 'admin.user.delete',
      subjectId: id,
    });
    return { ok: true };
  }

  @Get(':id/bookings')
  async bookingsOf(@Param('id', ParseUUIDPipe) id: string, @Query() query: Record<string, string>) {
    const dto = await validateInput(UserBookingsQueryDto, query, 'invalid_query');
    await this.users.requireById(id);
    return this.bookings.listBookingsForUser(id, { includePast: dto.includePast ?? false });
  }
}
