import { Controller, Get, Param, ParseUUIDPipe, Query, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { CalendarService, calendarToJson } from './calendar.service';
import { CalendarQueryDto, DayQueryDto } from './dto/booking.dto';
import { UsersService } from '../users/users.service';
import { CurrentUser } from '../auth/current-user.decorator';
import { AuthUser } from '../auth/auth-user';
import { validateInput } from '../common/validate';

// slot views of a machine live here because they read the booking ledger
@UseGuards(AuthGuard('jwt'))
@Controller('machines')
export class MachineCalendarController {
  constructor(
    private readonly calendar: CalendarService,
    private readonly users: UsersService,
  ) {}

  @Get(':id/slots')
  async daySlots(
    @CurrentUser() auth: AuthUser,
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: Record<string, string>,
  ) {
    const dto = await validateInput(DayQueryDto, query, 'invalid_query');
    const viewer = await this.users.requireActive(auth.userId);
    return { date: dto.date, slots: await this.calendar.getDaySlots(id, dto.date, viewer) };
  }

  @Get(':id/calendar')
  async month(
    @CurrentUser() auth: AuthUser,
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: Record<string, string>,
  ) {
    const dto = await validateInput(CalendarQueryDto, query, 'invalid_query');
    const viewer = await this.users.requireActive(auth.userId);
    const calendar = await this.calendar.getMonthCalendar(id, dto.year, dto.month, viewer, {
      excludePast: dto.excludePast ?? false,
    });
    return { machineId: id, year: dto.year, month: dto.month, days: calendarToJson(calendar) };
  }
}
