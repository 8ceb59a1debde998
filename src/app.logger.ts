import { ConsoleLogger, Injectable, LogLevel } from '@nestjs/common';

const LEVELS: LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'];

/**
 * Levels at or above `level` (one of LEVELS). Unknown values fall back to
 * `log`.
 */
export function resolveLogLevels(level?: string): LogLevel[] {
  const index = LEVELS.findIndex((l) => l === level);
  return LEVELS.slice(index === -1 ? LEVELS.indexOf('log') : index);
}

@Injectable()
export class AppLogger extends ConsoleLogger {
  constructor() {
    super('SalesOps', { logLevels: resolveLogLevels(process.env.LOG_LEVEL), timestamp: true });
  }
}
