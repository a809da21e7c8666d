import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { BookingsService, summarizeBooking } from './bookings.service';
import { SlotCoordinatesDto } from './dto/booking.dto';
import { UsersService } from '../users/users.service';
import { CurrentUser } from '../auth/current-user.decorator';
import { AuthUser } from '../auth/auth-user';
import { Requires } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { validateInput } from '../common/validate';

@UseGuards(AuthGuard('jwt'), RolesGuard)
@Controller('bookings')
export class BookingsController {
  constructor(
    private readonly bookings: BookingsService,
    private readonly users: UsersService,
  ) {}

  @Requires('book')
  @Post()
  async book(@CurrentUser() auth: AuthUser, @Body() body: SlotCoordinatesDto) {
    const dto = await validateInput(SlotCoordinatesDto, body);
    const user = await this.users.requireActive(auth.userId);
    const booking = await this.bookings.book(dto.machineId, dto.date, dto.slotNumber, user);
    return summarizeBooking(booking);
  }

  @Get('upcoming')
  async upcoming(@CurrentUser() auth: AuthUser) {
    const user = await this.users.requireActive(auth.userId);
    return this.bookings.listUpcomingBookings(user);
  }

  @Delete(':id')
  async cancelById(@CurrentUser() auth: AuthUser, @Param('id', ParseUUIDPipe) id: string) {
    const user = await this.users.requireActive(auth.userId);
    return this.bookings.cancel({ bookingId: id }, user);
  }

  @HttpCode(200)
  @Post('cancel')
  async cancelBySlot(@CurrentUser() auth: AuthUser, @Body() body: SlotCoordinatesDto) {
    const dto = await validateInput(SlotCoordinatesDto, body);
    const user = await this.users.requireActive(auth.userId);
    return this.bookings.cancel(
      { machineId: dto.machineId, date: dto.date, slotNumber: dto.slotNumber },
      user,
    );
  }
}
