import { Module } from '@nestjs/common';
import { RepresentativesModule } from '../representatives/representatives.module';
import { SourceDataModule } from '../source-data/source-data.module';
import { QueueController } from './queue.controller';
import { QueueService } from './queue.service';

@Module({
  imports: [RepresentativesModule, SourceDataModule],
  controllers: [QueueController],
  providers: [QueueService],
  exports: [QueueService],
})
export class QueueModule {}
