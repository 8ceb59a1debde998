import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { getEnvFilePath } from './env.helper';
import { SharedModule } from './shared.module';
import { StatusModule } from './status/status.module';
import { CallsModule } from './calls/calls.module';
import { SalesModule } from './sales/sales.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: getEnvFilePath(),
    }),
    SharedModule,
    StatusModule,
    CallsModule,
    SalesModule,
  ],
})
export class AppModule {}
