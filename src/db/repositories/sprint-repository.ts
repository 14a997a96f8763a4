import { FettersError, isUniqueViolation } from '../../errors.js';
import { formatDate } from '../../utils/dates.js';
import type { FettersDatabase } from '../database.js';
import type { SprintRow } from './types.js';

export interface NewSprint {
  name: string;
  start_date: string;
  end_date?: string | null;
  num_jobs?: number;
}

/**
 * Fields a sprint update may change. `end_date: null` clears the end date;
 * an omitted field is left untouched.
 */
export interface SprintUpdate {
  name?: string;
  start_date?: string;
  end_date?: string | null;
}

/**
 * Repository for the sprints table.
 *
 * `num_jobs` is only moved through increment/decrement, which JobRepository
 * calls inside the same transaction as the job insert, move or delete.
 */
export class SprintRepository {
  private db: FettersDatabase;
  private today: () => Date;

  constructor(db: FettersDatabase, today: () => Date = () => new Date()) {
    this.db = db;
    this.today = today;
  }

  /**
   * Insert a sprint. Throws SprintNameConflict if the name is taken.
   */
  add(sprint: NewSprint): SprintRow {
    try {
      const row = this.db
        .raw()
        .prepare<[string, string, string | null, number], SprintRow>(
          `INSERT INTO sprints (name, start_date, end_date, num_jobs)
           VALUES (?, ?, ?, ?)
           RETURNING *`,
        )
        .get(sprint.name, sprint.start_date, sprint.end_date ?? null, sprint.num_jobs ?? 0);
      if (!row) {
        throw new Error(`Sprint "${sprint.name}" missing after insert`);
      }
      return row;
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw FettersError.sprintNameConflict(sprint.name);
      }
      throw err;
    }
  }

  /**
   * Return the sprint with this name, creating it (starting today, no jobs) if missing.
   */
  getOrCreateByName(name: string): SprintRow {
    return this.db.transaction(() => {
      return this.findByName(name) ?? this.add({ name, start_date: formatDate(this.today()) });
    });
  }

  update(id: number, changes: SprintUpdate): SprintRow {
    const assignments: string[] = [];
    const values: Array<string | null> = [];

    if (changes.name !== undefined) {
      assignments.push('name = ?');
      values.push(changes.name);
    }
    if (changes.start_date !== undefined) {
      assignments.push('start_date = ?');
      values.push(changes.start_date);
    }
    if (changes.end_date !== undefined) {
      assignments.push('end_date = ?');
      values.push(changes.end_date);
    }

    if (assignments.length === 0) {
      return this.requireById(id);
    }

    try {
      const row = this.db
        .raw()
        .prepare<Array<string | number | null>, SprintRow>(
          `UPDATE sprints SET ${assignments.join(', ')} WHERE id = ? RETURNING *`,
        )
        .get(...values, id);
      if (!row) {
        throw FettersError.unknown(`Sprint ${id} not found`);
      }
      return row;
    } catch (err) {
      if (changes.name !== undefined && isUniqueViolation(err)) {
        throw FettersError.sprintNameConflict(changes.name);
      }
      throw err;
    }
  }

  listAll(): SprintRow[] {
    return this.db
      .raw()
      .prepare<[], SprintRow>('SELECT * FROM sprints ORDER BY id')
      .all();
  }

  findById(id: number): SprintRow | null {
    const row = this.db
      .raw()
      .prepare<[number], SprintRow>('SELECT * FROM sprints WHERE id = ?')
      .get(id);
    return row ?? null;
  }

  findByName(name: string): SprintRow | null {
    const row = this.db
      .raw()
      .prepare<[string], SprintRow>('SELECT * FROM sprints WHERE name = ?')
      .get(name);
    return row ?? null;
  }

  increment(id: number): void {
    this.db
      .raw()
      .prepare<[number]>('UPDATE sprints SET num_jobs = num_jobs + 1 WHERE id = ?')
      .run(id);
  }

  decrement(id: number): void {
    this.db
      .raw()
      .prepare<[number]>('UPDATE sprints SET num_jobs = num_jobs - 1 WHERE id = ?')
      .run(id);
  }

  private requireById(id: number): SprintRow {
    const row = this.findById(id);
    if (!row) {
      throw FettersError.unknown(`Sprint ${id} not found`);
    }
    return row;
  }
}
