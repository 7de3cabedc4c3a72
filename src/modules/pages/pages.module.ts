import { Module } from '@nestjs/common';
import { MapModule } from '../map/map.module';
import { QueueModule } from '../queue/queue.module';
import { SourceDataModule } from '../source-data/source-data.module';
import { StatsModule } from '../stats/stats.module';
import { PageDataService } from './page-data.service';
import { PagesController } from './pages.controller';
import { PrayerController } from './prayer.controller';

@Module({
  imports: [QueueModule, MapModule, StatsModule, SourceDataModule],
  controllers: [PagesController, PrayerController],
  providers: [PageDataService],
})
export class PagesModule {}
