import { Result } from '../common/result';

export type StatusMetric = 'contacts' | 'opportunities' | 'pipelines' | 'users';

export const STATUS_COLLECTIONS: Record<StatusMetric, string> = {
  contacts: 'ghl_contacts',
  opportunities: 'ghl_opportunities',
  pipelines: 'ghl_pipelines',
  users: 'ghl_users',
};

export const STATUS_LABELS: Record<StatusMetric, string> = {
  contacts: 'Total Contacts',
  opportunities: 'Opportunities',
  pipelines: 'Pipelines',
  users: 'Users',
};

export const STATUS_METRICS: StatusMetric[] = ['contacts', 'opportunities', 'pipelines', 'users'];

export type StatusCounts = Record<StatusMetric, number>;

export type StatusResults = Record<StatusMetric, Result<number>>;

/** Shown on the status page for a count that could not be fetched. */
export const MISSING_COUNT = '—';
