import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppLogger } from './app.logger';
import { AllExceptionsFilter } from './all-exceptions.filter';

async function bootstrap() {
  const logger = new AppLogger();
  const app = await NestFactory.create(AppModule, { logger });
  const configService = app.get(ConfigService);
  app.useGlobalFilters(new AllExceptionsFilter());
  app.enableShutdownHooks();

  const port = Number(configService.get('PORT', 3000));
  await app.listen(port);
  logger.log(`Dashboards listening on http://localhost:${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start dashboards:', error);
  process.exit(1);
});
