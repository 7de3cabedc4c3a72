import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { APP_CONFIG, AppConfig } from './config/app-config';
import { AppConfigModule } from './config/config.module';
import { DatabaseModule } from './modules/database/database.module';
import { MapModule } from './modules/map/map.module';
import { PagesModule } from './modules/pages/pages.module';
import { QueueModule } from './modules/queue/queue.module';
import { StatsModule } from './modules/stats/stats.module';

@Module({
  imports: [
    AppConfigModule,
    ThrottlerModule.forRootAsync({
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => [{ ttl: config.throttle.ttl, limit: config.throttle.limit }],
    }),
    DatabaseModule,
    QueueModule,
    MapModule,
    StatsModule,
    PagesModule,
  ],
  providers: [{ provide: APP_GUARD, useClass: ThrottlerGuard }],
})
export class AppModule {}
