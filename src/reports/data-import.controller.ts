import { Body, Controller, HttpCode, HttpException, Post, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { DataImportService } from './data-import.service';
import { DataImportDto } from './dto/data-import.dto';
import { EventLogService } from '../event-log/event-log.service';
import { CurrentUser } from '../auth/current-user.decorator';
import { AuthUser } from '../auth/auth-user';
import { Requires } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { validateInput } from '../common/validate';

@UseGuards(AuthGuard('jwt'), RolesGuard)
@Requires('manageAdmins')
@Controller('admin/data')
export class DataImportController {
  constructor(
    private readonly importer: DataImportService,
    private readonly events: EventLogService,
  ) {}

  @Post('import')
  @HttpCode(200)
  async importAll(@CurrentUser() auth: AuthUser, @Body() body: unknown) {
    try {
      const dto = await validateInput(DataImportDto, body, 'invalid_import');
      const imported = await this.importer.importAll(dto);
      await this.events.record({ actorId: auth.userId, action: 'admin.data.import', details: imported });
      return { imported };
    } catch (err) {
      await this.events.record({
        actorId: auth.userId,
        action: 'admin.data.import',
        outcome: 'error',
        message: err instanceof HttpException ? err.message : 'import_failed',
      });
      throw err;
    }
  }
}
