import { Controller, Get, Header } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getRefreshSeconds } from '../env.helper';
import { renderDashboardPage } from '../presentation/html';
import { ResponseHelper } from '../response.helper';
import { SalesService } from './sales.service';
import { toSalesPage } from './sales.page';

@Controller('sales')
export class SalesController {
  constructor(
    private readonly salesService: SalesService,
    private readonly configService: ConfigService,
    private readonly responseHelper: ResponseHelper,
  ) {}

  /**
   * GET /sales
   * Opportunities dashboard page
   */
  @Get()
  @Header('Content-Type', 'text/html; charset=utf-8')
  async getPage() {
    const view = await this.salesService.recompute();
    return renderDashboardPage(toSalesPage(view, getRefreshSeconds(this.configService)));
  }

  /**
   * GET /sales/data
   * The same view as JSON
   */
  @Get('data')
  async getData() {
    const view = await this.salesService.recompute();
    return this.responseHelper.success(view, 'Sales dashboard retrieved successfully');
  }
}
