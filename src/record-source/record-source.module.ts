import { Module } from '@nestjs/common';
import { SharedModule } from '../shared.module';
import { documentStoreProvider } from './record-source.providers';
import { RecordSourceService } from './record-source.service';

@Module({
  imports: [SharedModule],
  providers: [documentStoreProvider, RecordSourceService],
  exports: [RecordSourceService],
})
export class RecordSourceModule {}
