import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { MachinesService } from '../machines/machines.service';
import { toMachineView } from '../machines/machine-view';
import { Requires } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { validateInput } from '../common/validate';
import { CreateMachineDto, MachineStatusDto, UpdateMachineDto } from './dto/admin.dto';

@UseGuards(AuthGuard('jwt'), RolesGuard)
@Requires('administer')
@Controller('admin/machines')
export class AdminMachinesController {
  constructor(private readonly machines: MachinesService) {}

  @Get()
  async list() {
    return (await this.machines.listAll()).map(toMachineView);
  }

  @Post()
  async create(@Body() body: CreateMachineDto) {
    const dto = await validateInput(CreateMachineDto, body);
    const saved = await this.machines.create(dto);
    return toMachineView(await this.machines.get(saved.id));
  }

  @Patch(':id')
  async update(@Param('id', ParseUUIDPipe) id: string, @Body() body: UpdateMachineDto) {
    const dto = await validateInput(UpdateMachineDto, body);
    await this.machines.update(id, dto);
    return toMachineView(await this.machines.get(id));
  }

  @Patch(':id/status')
  async setStatus(@Param('id', ParseUUIDPipe) id: string, @Body() body: MachineStatusDto) {
    const dto = await validateInput(MachineStatusDto, body);
    const saved = await this.machines.setStatus(id, dto.status);
    return { id: saved.id, status: saved.status };
  }

  @Delete(':id')
  retire(@Param('id', ParseUUIDPipe) id: string) {
    return this.machines.retire(id);
  }
}
