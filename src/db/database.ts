import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { FettersError } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { CREATE_SCHEMA_MIGRATIONS_TABLE, MIGRATIONS } from './schema.js';
import type { Migration } from './schema.js';

export const IN_MEMORY = ':memory:';

export interface DatabaseOptions {
  logger?: Logger;
  migrations?: readonly Migration[];
}

/**
 * Thin wrapper around better-sqlite3 that applies migrations on open.
 * One handle is held for the lifetime of a command invocation.
 */
export class FettersDatabase {
  private db: Database.Database;
  private logger: Logger;

  constructor(dbPath: string, options: DatabaseOptions = {}) {
    this.logger = options.logger ?? silentLogger;

    if (dbPath !== IN_MEMORY) {
      try {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      } catch (err) {
        throw FettersError.io(err);
      }
    }

    try {
      this.db = new Database(dbPath);
    } catch (err) {
      throw FettersError.storeConnection(err);
    }

    if (dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');

    this.logger.debug('Opened database', { path: dbPath });
    this.runMigrations(options.migrations ?? MIGRATIONS);
  }

  /**
   * Returns the raw better-sqlite3 Database instance for direct queries.
   */
  raw(): Database.Database {
    return this.db;
  }

  /**
   * Run `fn` atomically. Nested calls become savepoints of the outer transaction.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /** Names of the migrations recorded as applied, in application order. */
  appliedMigrations(): string[] {
    return this.db
      .prepare<[], { name: string }>('SELECT name FROM schema_migrations ORDER BY rowid')
      .all()
      .map((row) => row.name);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private runMigrations(migrations: readonly Migration[]): void {
    try {
      this.db.exec(CREATE_SCHEMA_MIGRATIONS_TABLE);
      const applied = new Set(this.appliedMigrations());
      const record = this.db.prepare<[string, string]>(
        'INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?)',
      );

      for (const migration of migrations) {
        if (applied.has(migration.name)) continue;

        this.transaction(() => {
          for (const sql of migration.statements) {
            this.db.exec(sql);
          }
          record.run(migration.name, new Date().toISOString());
        });
        this.logger.debug('Applied migration', { name: migration.name });
      }
    } catch (err) {
      this.db.close();
      throw FettersError.migration(err);
    }
  }
}
