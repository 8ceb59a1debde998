import { Injectable } from '@nestjs/common';
import { RecordSourceService } from '../record-source/record-source.service';
import { AppLogger } from '../app.logger';
import { CONTACTS_COLLECTION, SalesDashboardView, SalesTrigger } from './sales.schema';
import { buildSalesView } from './sales.view';

@Injectable()
export class SalesService {
  constructor(
    private readonly recordSource: RecordSourceService,
    private readonly logger: AppLogger,
  ) {}

  async recompute(trigger: SalesTrigger = {}): Promise<SalesDashboardView> {
    const records = await this.recordSource.fetch(CONTACTS_COLLECTION);
    this.logger.debug(`Sales dashboard rebuilt from ${records.length} contacts`, SalesService.name);
    return buildSalesView(records, trigger);
  }
}
