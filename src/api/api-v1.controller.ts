import { Controller, Get, Param, ParseUUIDPipe, Query, UseGuards } from '@nestjs/common';
import { ApiTokenGuard } from '../auth/api-token.guard';
import { RolesGuard } from '../auth/roles.guard';
import { Requires } from '../auth/roles.decorator';
import { CurrentUser } from '../auth/current-user.decorator';
import { AuthUser } from '../auth/auth-user';
import { BuildingsService } from '../buildings/buildings.service';
import { MachinesService } from '../machines/machines.service';
import { toMachineView } from '../machines/machine-view';
import { CalendarService, calendarToJson } from '../bookings/calendar.service';
import { CalendarQueryDto } from '../bookings/dto/booking.dto';
import { UsersService } from '../users/users.service';
import { toProfile } from '../users/user-profile';
import { ReportsService } from '../reports/reports.service';
import { validateInput } from '../common/validate';

/** Read-only API for integrations, authenticated with admin-issued bearer tokens. */
@UseGuards(ApiTokenGuard, RolesGuard)
@Controller('api/v1')
export class ApiV1Controller {
  constructor(
    private readonly buildings: BuildingsService,
    private readonly machines: MachinesService,
    private readonly calendar: CalendarService,
    private readonly users: UsersService,
    private readonly reports: ReportsService,
  ) {}

  @Get('buildings')
  async buildingList() {
    const list = await this.buildings.list();
    return list.map((b) => ({ id: b.id, name: b.name, code: b.code ?? null }));
  }

  @Get('machines')
  async machineList(@CurrentUser() auth: AuthUser) {
    const owner = await this.users.requireActive(auth.userId);
    return (await this.machines.listFor(owner)).map(toMachineView);
  }

  @Get('machines/:id/calendar')
  async machineCalendar(
    @CurrentUser() auth: AuthUser,
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: Record<string, string>,
  ) {
    const dto = await validateInput(CalendarQueryDto, query, 'invalid_query');
    const owner = await this.users.requireActive(auth.userId);
    const calendar = await this.calendar.getMonthCalendar(id, dto.year, dto.month, owner, {
      excludePast: dto.excludePast ?? false,
    });
    return { machineId: id, year: dto.year, month: dto.month, days: calendarToJson(calendar) };
  }

  @Requires('administer')
  @Get('users')
  async userList() {
    const list = await this.users.list();
    return list.map((u) => ({ ...toProfile(u), isActive: u.isActive }));
  }

  @Requires('administer')
  @Get('export')
  export() {
    return this.reports.exportAll();
  }
}
