import * as path from 'path';
import { Clock } from '../src/common/clock';
import { AppConfig, loadAppConfig } from '../src/config/app-config';
import { DatabaseService } from '../src/modules/database/database.service';
import { MapService } from '../src/modules/map/map.service';
import { QueueService } from '../src/modules/queue/queue.service';
import { RepresentativesRepository } from '../src/modules/representatives/representatives.repository';
import { SourceDataService } from '../src/modules/source-data/source-data.service';
import { StatsService } from '../src/modules/stats/stats.service';

export const FIXTURES = path.join(__dirname, 'fixtures');

export function fixtureConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadAppConfig({
    COUNTRIES_CONFIG: path.join(FIXTURES, 'countries.json'),
    DATABASE_PATH: ':memory:',
    ICONS_DIR: path.join(FIXTURES, 'icons'),
    THROTTLE_LIMIT: '1000',
    MAP_SIZE: '200',
    ...env,
  });
}

export class FixedClock implements Clock {
  constructor(private current: Date) {}

  now() {
    return new Date(this.current.getTime());
  }

  advance(ms: number) {
    this.current = new Date(this.current.getTime() + ms);
  }
}

/** Wires the services by hand over an in-memory database, without a Nest container. */
export function createServices(config: AppConfig = fixtureConfig(), clock = new FixedClock(new Date('2024-03-10T10:00:00.000Z'))) {
  const database = new DatabaseService(config);
  database.onModuleInit();
  const sourceData = new SourceDataService(config);
  sourceData.onModuleInit();
  const representatives = new RepresentativesRepository(database);
  const queue = new QueueService(database, representatives, sourceData, clock);
  const map = new MapService(config, sourceData, representatives, queue);
  const stats = new StatsService(queue, representatives, sourceData);

  return {
    config,
    clock,
    database,
    sourceData,
    representatives,
    queue,
    map,
    stats,
    close: () => database.onModuleDestroy(),
  };
}

export type Services = ReturnType<typeof createServices>;

export function countMatches(text: string, pattern: RegExp): number {
  return (text.match(pattern) ?? []).length;
}
