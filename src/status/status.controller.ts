import { Controller, Get, Header } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getRefreshSeconds } from '../env.helper';
import { renderStatusPage } from '../presentation/html';
import { StatusService } from './status.service';
import { StatusCounts } from './status.schema';

@Controller()
export class StatusController {
  constructor(
    private readonly statusService: StatusService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * GET /
   * Status page with the four collection counts and the time of the reading
   */
  @Get()
  @Header('Content-Type', 'text/html; charset=utf-8')
  async getPage(): Promise<string> {
    const page = await this.statusService.getPage(getRefreshSeconds(this.configService));
    return renderStatusPage(page);
  }

  /**
   * GET /api/stats
   * The same counts as integers, 0 for any count that failed
   */
  @Get('api/stats')
  async getStats(): Promise<StatusCounts> {
    return this.statusService.getStats();
  }
}
