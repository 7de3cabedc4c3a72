import { Module } from '@nestjs/common';
import { QueueModule } from '../queue/queue.module';
import { RepresentativesModule } from '../representatives/representatives.module';
import { SourceDataModule } from '../source-data/source-data.module';
import { StatsController } from './stats.controller';
import { StatsService } from './stats.service';

@Module({
  imports: [QueueModule, RepresentativesModule, SourceDataModule],
  controllers: [StatsController],
  providers: [StatsService],
  exports: [StatsService],
})
export class StatsModule {}
