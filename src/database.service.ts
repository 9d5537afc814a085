// ============================================================
// Identity Graph Engine — DatabaseService
//
// Owns the single better-sqlite3 connection shared by the graph
// store and the ingestion ledger. The schema is applied on
// every start (all statements are IF NOT EXISTS).
// ============================================================

import {
  Injectable,
  OnModuleInit,
  OnModuleDestroy,
  Logger,
} from '@nestjs/common';
import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { Settings } from './config/settings';
import { SCHEMA_DDL } from './database.schema';

const IN_MEMORY = ':memory:';

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private db: Database.Database | null = null;

  constructor(private readonly settings: Settings) {}

  async onModuleInit(): Promise<void> {
    const path = this.settings.databasePath;
    if (path !== IN_MEMORY) {
      mkdirSync(dirname(path), { recursive: true });
    }

    this.db = new Database(path);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA_DDL);

    this.logger.log(`Opened graph database at ${path}`);
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.db) return;
    this.db.close();
    this.db = null;
    this.logger.log('Closed graph database');
  }

  /** The open connection. Throws before onModuleInit or after shutdown. */
  get connection(): Database.Database {
    if (!this.db) {
      throw new Error('Graph database is not open');
    }
    return this.db;
  }

  /** Readiness probe: true when a trivial query succeeds. */
  ping(): boolean {
    try {
      this.connection.prepare('SELECT 1').get();
      return true;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn('Database ping failed: ' + reason);
      return false;
    }
  }
}
