import { Controller, Get, Header, Query } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { parseDateRange } from '../analytics/date-range';
import { getRefreshSeconds } from '../env.helper';
import { renderDashboardPage } from '../presentation/html';
import { ResponseHelper } from '../response.helper';
import { CallsService } from './calls.service';
import { toCallsPage } from './calls.page';

@Controller('calls')
export class CallsController {
  constructor(
    private readonly callsService: CallsService,
    private readonly configService: ConfigService,
    private readonly responseHelper: ResponseHelper,
  ) {}

  /**
   * GET /calls
   * Calls dashboard page. Query params: start, end (YYYY-MM-DD, both required to filter)
   */
  @Get()
  @Header('Content-Type', 'text/html; charset=utf-8')
  async getPage(@Query('start') start?: string, @Query('end') end?: string) {
    const range = parseDateRange(start, end);
    const view = await this.callsService.recompute({ range });
    const href = range ? `/calls?start=${range.start}&end=${range.end}` : '/calls';
    return renderDashboardPage(toCallsPage(view, href, getRefreshSeconds(this.configService)));
  }

  /**
   * GET /calls/data
   * The same view as JSON
   */
  @Get('data')
  async getData(@Query('start') start?: string, @Query('end') end?: string) {
    const view = await this.callsService.recompute({ range: parseDateRange(start, end) });
    return this.responseHelper.success(view, 'Calls dashboard retrieved successfully');
  }
}
