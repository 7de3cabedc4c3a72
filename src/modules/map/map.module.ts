import { Module } from '@nestjs/common';
import { QueueModule } from '../queue/queue.module';
import { RepresentativesModule } from '../representatives/representatives.module';
import { SourceDataModule } from '../source-data/source-data.module';
import { MapController } from './map.controller';
import { MapService } from './map.service';

@Module({
  imports: [QueueModule, RepresentativesModule, SourceDataModule],
  controllers: [MapController],
  providers: [MapService],
  exports: [MapService],
})
export class MapModule {}
