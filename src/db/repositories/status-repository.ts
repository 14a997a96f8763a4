import type { FettersDatabase } from '../database.js';
import type { StatusRow } from './types.js';

/**
 * Application statuses written on first run.
 */
export const DEFAULT_STATUSES = [
  'GHOSTED',
  'HIRED',
  'IN PROGRESS',
  'NOT HIRING ANYMORE',
  'OFFER RECEIVED',
  'PENDING',
  'REJECTED',
] as const;

export type ApplicationStatus = (typeof DEFAULT_STATUSES)[number];

/**
 * Repository for the statuses table. Rows are only ever seeded, never changed.
 */
export class StatusRepository {
  private db: FettersDatabase;

  constructor(db: FettersDatabase) {
    this.db = db;
  }

  /**
   * Insert each default status that is missing. Safe to call on every run.
   * Returns the number of rows inserted.
   */
  seed(): number {
    const raw = this.db.raw();
    const find = raw.prepare<[string], StatusRow>('SELECT * FROM statuses WHERE name = ?');
    const insert = raw.prepare<[string]>('INSERT INTO statuses (name) VALUES (?)');

    return this.db.transaction(() => {
      let inserted = 0;
      for (const name of DEFAULT_STATUSES) {
        if (!find.get(name)) {
          insert.run(name);
          inserted++;
        }
      }
      return inserted;
    });
  }

  list(): StatusRow[] {
    return this.db
      .raw()
      .prepare<[], StatusRow>('SELECT * FROM statuses ORDER BY id')
      .all();
  }

  findByName(name: string): StatusRow | null {
    const row = this.db
      .raw()
      .prepare<[string], StatusRow>('SELECT * FROM statuses WHERE name = ?')
      .get(name);
    return row ?? null;
  }
}
