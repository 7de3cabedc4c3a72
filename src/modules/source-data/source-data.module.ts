import { Module } from '@nestjs/common';
import { SourceDataService } from './source-data.service';

@Module({
  providers: [SourceDataService],
  exports: [SourceDataService],
})
export class SourceDataModule {}
