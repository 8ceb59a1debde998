import { Module } from '@nestjs/common';
import { RecordSourceModule } from '../record-source/record-source.module';
import { SharedModule } from '../shared.module';
import { CallsController } from './calls.controller';
import { CallsService } from './calls.service';

@Module({
  imports: [RecordSourceModule, SharedModule],
  controllers: [CallsController],
  providers: [CallsService],
})
export class CallsModule {}
