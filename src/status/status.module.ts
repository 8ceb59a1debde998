import { Module } from '@nestjs/common';
import { RecordSourceModule } from '../record-source/record-source.module';
import { StatusController } from './status.controller';
import { StatusService } from './status.service';

@Module({
  imports: [RecordSourceModule],
  controllers: [StatusController],
  providers: [StatusService],
})
export class StatusModule {}
