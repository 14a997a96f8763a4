import type { FettersDatabase } from '../database.js';
import type { TitleRow } from './types.js';

/**
 * Repository for the titles table. Titles are interned: one row per distinct name.
 */
export class TitleRepository {
  private db: FettersDatabase;

  constructor(db: FettersDatabase) {
    this.db = db;
  }

  /**
   * Insert the title, or return the existing row when the name is already stored.
   */
  getOrCreate(name: string): TitleRow {
    const raw = this.db.raw();
    return this.db.transaction(() => {
      raw
        .prepare<[string]>('INSERT INTO titles (name) VALUES (?) ON CONFLICT (name) DO NOTHING')
        .run(name);
      const row = raw
        .prepare<[string], TitleRow>('SELECT * FROM titles WHERE name = ?')
        .get(name);
      if (!row) {
        throw new Error(`Title "${name}" missing after insert`);
      }
      return row;
    });
  }

  get(id: number): TitleRow | null {
    const row = this.db
      .raw()
      .prepare<[number], TitleRow>('SELECT * FROM titles WHERE id = ?')
      .get(id);
    return row ?? null;
  }

  list(): TitleRow[] {
    return this.db
      .raw()
      .prepare<[], TitleRow>('SELECT * FROM titles ORDER BY name')
      .all();
  }
}
