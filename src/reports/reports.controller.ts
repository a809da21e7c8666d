import { Controller, Get, Header, Query, StreamableFile, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ReportsService } from './reports.service';
import { MonthReportQueryDto } from './dto/report-query.dto';
import { Requires } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { validateInput } from '../common/validate';

@UseGuards(AuthGuard('jwt'), RolesGuard)
@Requires('administer')
@Controller('reports')
export class ReportsController {
  constructor(private readonly reports: ReportsService) {}

  @Get('bookings-month.csv')
  @Header('Content-Type', 'text/csv; charset=utf-8')
  async monthCsv(@Query() query: Record<string, string>) {
    const dto = await validateInput(MonthReportQueryDto, query, 'invalid_query');
    const rows = await this.reports.monthBookings(dto.year, dto.month, dto.machineId);
    return this.reports.toCsv(rows);
  }

  @Get('bookings-month.xlsx')
  async monthWorkbook(@Query() query: Record<string, string>) {
    const dto = await validateInput(MonthReportQueryDto, query, 'invalid_query');
    const rows = await this.reports.monthBookings(dto.year, dto.month, dto.machineId);
    const mm = String(dto.month).padStart(2, '0');
    return new StreamableFile(await this.reports.toWorkbook(rows, dto.year, dto.month), {
      type: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
      disposition: `attachment; filename="bookings-${dto.year}-${mm}.xlsx"`,
    });
  }

  @Get('export.json')
  export() {
    return this.reports.exportAll();
  }
}
