import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { APP_CONFIG, AppConfig, PROJECT_ROOT } from '../../config/app-config';

const SCHEMA_PATH = path.join(PROJECT_ROOT, 'db', 'schema.sql');

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  readonly db: Database.Database;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    if (config.databasePath !== ':memory:') {
      fs.mkdirSync(path.dirname(config.databasePath), { recursive: true });
    }
    this.db = new Database(config.databasePath);
    if (config.databasePath !== ':memory:') this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
  }

  onModuleInit() {
    this.db.exec(fs.readFileSync(SCHEMA_PATH, 'utf-8'));
    this.logger.log('Database schema ready');
  }

  onModuleDestroy() {
    this.db.close();
  }

  /** Runs `fn` inside a single SQLite transaction; a throw rolls everything back. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }
}
