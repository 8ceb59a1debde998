import { Module } from '@nestjs/common';
import { RecordSourceModule } from '../record-source/record-source.module';
import { SharedModule } from '../shared.module';
import { SalesController } from './sales.controller';
import { SalesService } from './sales.service';

@Module({
  imports: [RecordSourceModule, SharedModule],
  controllers: [SalesController],
  providers: [SalesService],
})
export class SalesModule {}
