import { FettersError } from '../../errors.js';
import { projectInsights } from '../../projectors/insights.js';
import type { FettersDatabase } from '../database.js';
import { SprintRepository } from './sprint-repository.js';
import type {
  InsightRow,
  JobFilter,
  JobRow,
  LabelCount,
  ListedJob,
  SprintRow,
} from './types.js';

export interface NewJob {
  company_name: string;
  created: string;
  title_id: number;
  status_id: number;
  link?: string | null;
  notes?: string | null;
  sprint_id: number;
}

/**
 * Fields a job update may change. `null` clears link or notes; an omitted
 * field is left untouched. `created` is never rewritten.
 */
export interface JobUpdate {
  company_name?: string;
  title_id?: number;
  status_id?: number;
  link?: string | null;
  notes?: string | null;
  sprint_id?: number;
}

type SqlValue = string | number | null;

/**
 * Escape LIKE wildcards so user input only ever matches literally.
 * Pair with `ESCAPE '\'` in the query.
 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function likePattern(value: string): string {
  return `%${escapeLike(value)}%`;
}

const LIST_JOBS_SELECT = `
SELECT
  jobs.id AS id,
  jobs.created AS created,
  jobs.company_name AS company_name,
  titles.name AS title,
  statuses.name AS status,
  NULLIF(
    (SELECT COUNT(*) FROM interview_stages WHERE interview_stages.job_id = jobs.id),
    0
  ) AS stages_count,
  jobs.link AS link,
  jobs.notes AS notes
FROM jobs
LEFT JOIN titles ON jobs.title_id = titles.id
LEFT JOIN statuses ON jobs.status_id = statuses.id
LEFT JOIN sprints ON jobs.sprint_id = sprints.id`;

/**
 * Repository for the jobs table. Owns the sprint counter bookkeeping: every
 * insert, sprint move and delete adjusts `sprints.num_jobs` in one transaction.
 */
export class JobRepository {
  private db: FettersDatabase;
  private sprints: SprintRepository;

  constructor(db: FettersDatabase) {
    this.db = db;
    this.sprints = new SprintRepository(db);
  }

  add(job: NewJob): JobRow {
    return this.db.transaction(() => {
      const row = this.db
        .raw()
        .prepare<SqlValue[], JobRow>(
          `INSERT INTO jobs (company_name, created, title_id, status_id, link, notes, sprint_id)
           VALUES (?, ?, ?, ?, ?, ?, ?)
           RETURNING *`,
        )
        .get(
          job.company_name,
          job.created,
          job.title_id,
          job.status_id,
          job.link ?? null,
          job.notes ?? null,
          job.sprint_id,
        );
      if (!row) {
        throw FettersError.unknown(`Job for ${job.company_name} missing after insert`);
      }
      this.sprints.increment(row.sprint_id);
      return row;
    });
  }

  /**
   * Write only the supplied fields. Moving a job to another sprint moves one
   * unit of `num_jobs` from the old sprint to the new one.
   */
  update(id: number, changes: JobUpdate): JobRow {
    return this.db.transaction(() => {
      const existing = this.requireById(id);

      const assignments: string[] = [];
      const values: SqlValue[] = [];
      const set = (column: keyof JobUpdate, value: SqlValue | undefined): void => {
        if (value === undefined) return;
        assignments.push(`${column} = ?`);
        values.push(value);
      };

      set('company_name', changes.company_name);
      set('title_id', changes.title_id);
      set('status_id', changes.status_id);
      set('link', changes.link);
      set('notes', changes.notes);
      set('sprint_id', changes.sprint_id);

      if (assignments.length === 0) {
        return existing;
      }

      const row = this.db
        .raw()
        .prepare<SqlValue[], JobRow>(
          `UPDATE jobs SET ${assignments.join(', ')} WHERE id = ? RETURNING *`,
        )
        .get(...values, id);
      if (!row) {
        throw FettersError.unknown(`Job ${id} not found`);
      }

      if (row.sprint_id !== existing.sprint_id) {
        this.sprints.decrement(existing.sprint_id);
        this.sprints.increment(row.sprint_id);
      }
      return row;
    });
  }

  /**
   * Delete a job and return the removed row. Its interview stages go with it
   * (ON DELETE CASCADE) and its sprint's counter is decremented.
   */
  delete(id: number): JobRow {
    return this.db.transaction(() => {
      const row = this.db
        .raw()
        .prepare<[number], JobRow>('DELETE FROM jobs WHERE id = ? RETURNING *')
        .get(id);
      if (!row) {
        throw FettersError.unknown(`Job ${id} not found`);
      }
      this.sprints.decrement(row.sprint_id);
      return row;
    });
  }

  findById(id: number): JobRow | null {
    const row = this.db
      .raw()
      .prepare<[number], JobRow>('SELECT * FROM jobs WHERE id = ?')
      .get(id);
    return row ?? null;
  }

  /**
   * List jobs matching the filter in insertion order.
   *
   * Without `filter.sprint` only the current sprint is listed. String filters
   * are substring matches (SQLite LIKE, ASCII case-insensitive). The stage
   * count filter runs on the returned rows.
   */
  list(filter: JobFilter, currentSprint: SprintRow): ListedJob[] {
    const conditions: string[] = [];
    const values: SqlValue[] = [];
    const like = (column: string, value: string | undefined): void => {
      if (value === undefined) return;
      conditions.push(`${column} LIKE ? ESCAPE '\\'`);
      values.push(likePattern(value));
    };

    if (filter.sprint !== undefined) {
      like('sprints.name', filter.sprint);
    } else {
      conditions.push('jobs.sprint_id = ?');
      values.push(currentSprint.id);
    }
    like('jobs.company_name', filter.company);
    like('jobs.link', filter.link);
    like('jobs.notes', filter.notes);
    like('statuses.name', filter.status);
    like('titles.name', filter.title);

    const sql = `${LIST_JOBS_SELECT}
WHERE ${conditions.join(' AND ')}
ORDER BY jobs.id ASC`;

    const rows = this.db.raw().prepare<SqlValue[], ListedJob>(sql).all(...values);

    const stages = filter.stages;
    if (stages === undefined) {
      return rows;
    }
    if (stages === 0) {
      return rows.filter((row) => row.stages_count !== null);
    }
    return rows.filter((row) => row.stages_count === stages);
  }

  countTotal(): number {
    const row = this.db
      .raw()
      .prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM jobs')
      .get();
    return row?.total ?? 0;
  }

  countInSprint(sprintId: number): number {
    const row = this.db
      .raw()
      .prepare<[number], { total: number }>(
        'SELECT COUNT(*) AS total FROM jobs WHERE sprint_id = ?',
      )
      .get(sprintId);
    return row?.total ?? 0;
  }

  /**
   * Jobs per status within the current sprint. Statuses without jobs are omitted.
   */
  countPerStatus(currentSprint: SprintRow): InsightRow[] {
    const counts = this.db
      .raw()
      .prepare<[number], LabelCount>(
        `SELECT statuses.name AS label, COUNT(jobs.id) AS count
         FROM jobs
         JOIN statuses ON jobs.status_id = statuses.id
         WHERE jobs.sprint_id = ?
         GROUP BY statuses.id
         ORDER BY statuses.name`,
      )
      .all(currentSprint.id);

    return projectInsights(counts, this.totals(currentSprint));
  }

  /**
   * Jobs per sprint across the whole database. The sprint percentage is taken
   * against the current sprint's total, so other sprints may exceed 100%.
   */
  countPerSprint(currentSprint: SprintRow): InsightRow[] {
    const counts = this.db
      .raw()
      .prepare<[], LabelCount>(
        `SELECT sprints.name AS label, COUNT(jobs.id) AS count
         FROM jobs
         JOIN sprints ON jobs.sprint_id = sprints.id
         GROUP BY sprints.id
         ORDER BY sprints.id`,
      )
      .all();

    return projectInsights(counts, this.totals(currentSprint));
  }

  private totals(currentSprint: SprintRow): { sprintTotal: number; overallTotal: number } {
    return {
      sprintTotal: this.countInSprint(currentSprint.id),
      overallTotal: this.countTotal(),
    };
  }

  private requireById(id: number): JobRow {
    const row = this.findById(id);
    if (!row) {
      throw FettersError.unknown(`Job ${id} not found`);
    }
    return row;
  }
}
