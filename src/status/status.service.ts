import { Injectable } from '@nestjs/common';
import { RecordSourceService } from '../record-source/record-source.service';
import { formatTimestamp } from '../analytics/format';
import { unwrapOr } from '../common/result';
import { StatusPage } from '../presentation/html';
import {
  MISSING_COUNT,
  STATUS_COLLECTIONS,
  STATUS_LABELS,
  STATUS_METRICS,
  StatusCounts,
  StatusResults,
} from './status.schema';

@Injectable()
export class StatusService {
  constructor(private readonly recordSource: RecordSourceService) {}

  /** One count per status collection, each succeeding or failing on its own. */
  async getResults(): Promise<StatusResults> {
    const [contacts, opportunities, pipelines, users] = await Promise.all(
      STATUS_METRICS.map((metric) => this.recordSource.countResult(STATUS_COLLECTIONS[metric])),
    );
    return { contacts, opportunities, pipelines, users };
  }

  /** Counts for the JSON API; failed counts are 0. */
  async getStats(): Promise<StatusCounts> {
    const results = await this.getResults();
    return {
      contacts: unwrapOr(results.contacts, 0),
      opportunities: unwrapOr(results.opportunities, 0),
      pipelines: unwrapOr(results.pipelines, 0),
      users: unwrapOr(results.users, 0),
    };
  }

  /** Status page model; failed counts show as a dash. */
  async getPage(refreshSeconds: number, now: Date = new Date()): Promise<StatusPage> {
    const results = await this.getResults();
    return {
      title: 'Sales Dashboard',
      cards: STATUS_METRICS.map((metric) => {
        const result = results[metric];
        return { label: STATUS_LABELS[metric], value: result.ok ? String(result.value) : MISSING_COUNT };
      }),
      lastUpdate: formatTimestamp(now),
      refreshSeconds,
    };
  }
}
