import { Injectable } from '@nestjs/common';
import { RecordSourceService } from '../record-source/record-source.service';
import { AppLogger } from '../app.logger';
import { CALLS_COLLECTION, CallDashboardView, CallTrigger } from './calls.schema';
import { buildCallsView } from './calls.view';

@Injectable()
export class CallsService {
  constructor(
    private readonly recordSource: RecordSourceService,
    private readonly logger: AppLogger,
  ) {}

  /**
   * Fetch every call record and rebuild the dashboard for the trigger.
   * A store failure yields the empty dashboard.
   */
  async recompute(trigger: CallTrigger = {}): Promise<CallDashboardView> {
    const records = await this.recordSource.fetch(CALLS_COLLECTION);
    const view = buildCallsView(records, trigger);
    this.logger.debug(
      `Calls dashboard rebuilt from ${records.length} records (${view.kpis.totalCalls} in range)`,
      CallsService.name,
    );
    return view;
  }
}
