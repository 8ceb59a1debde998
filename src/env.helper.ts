import { ConfigService } from '@nestjs/config';
import { existsSync } from 'fs';
import { join } from 'path';

/**
 * `.env.<APP_ENV|NODE_ENV>` next to the project root when present,
 * otherwise the plain `.env`.
 */
export function getEnvFilePath(root: string = join(__dirname, '..')): string {
  const env = process.env.APP_ENV || process.env.NODE_ENV || 'local';
  const envPath = join(root, `.env.${env}`);
  if (existsSync(envPath)) {
    return envPath;
  }
  return join(root, '.env');
}

/** Auto-refresh cadence of the dashboard pages, in seconds. */
export function getRefreshSeconds(configService: ConfigService): number {
  const seconds = Number(configService.get('DASHBOARD_REFRESH_SECONDS', 30));
  return Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 30;
}
