import { Controller, Get, Param, ParseUUIDPipe, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { MachinesService } from './machines.service';
import { toMachineView } from './machine-view';
import { UsersService } from '../users/users.service';
import { CurrentUser } from '../auth/current-user.decorator';
import { AuthUser } from '../auth/auth-user';

@UseGuards(AuthGuard('jwt'))
@Controller('machines')
export class MachinesController {
  constructor(
    private readonly machines: MachinesService,
    private readonly users: UsersService,
  ) {}

  @Get()
  async list(@CurrentUser() auth: AuthUser) {
    const viewer = await this.users.requireActive(auth.userId);
    const list = await this.machines.listFor(viewer);
    return list.map(toMachineView);
  }

  @Get(':id')
  async get(@CurrentUser() auth: AuthUser, @Param('id', ParseUUIDPipe) id: string) {
    const viewer = await this.users.requireActive(auth.userId);
    return toMachineView(await this.machines.getFor(id, viewer));
  }
}
