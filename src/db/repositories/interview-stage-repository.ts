import { FettersError } from '../../errors.js';
import type { FettersDatabase } from '../database.js';
import type { InterviewStageRow, StageStatus } from './types.js';

export interface NewInterviewStage {
  job_id: number;
  stage_number: number;
  name?: string | null;
  status: StageStatus;
  scheduled_date: string;
  notes?: string | null;
  created: string;
}

/** `job_id` and `stage_number` are not updatable. */
export interface InterviewStageUpdate {
  name?: string | null;
  status?: StageStatus;
  scheduled_date?: string;
  notes?: string | null;
}

type SqlValue = string | number | null;

/**
 * Repository for the interview_stages table.
 *
 * A job's stages are numbered 1..N with no gaps. New stages append at
 * nextStageNumber(); removing one must be followed by renumber() in the same
 * transaction, which deleteAndRenumber() does.
 */
export class InterviewStageRepository {
  private db: FettersDatabase;

  constructor(db: FettersDatabase) {
    this.db = db;
  }

  /**
   * Insert a stage at the caller-supplied number. Callers take the number from
   * nextStageNumber() so stages always append.
   */
  add(stage: NewInterviewStage): InterviewStageRow {
    const row = this.db
      .raw()
      .prepare<SqlValue[], InterviewStageRow>(
        `INSERT INTO interview_stages
         (job_id, stage_number, name, status, scheduled_date, notes, created)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         RETURNING *`,
      )
      .get(
        stage.job_id,
        stage.stage_number,
        stage.name ?? null,
        stage.status,
        stage.scheduled_date,
        stage.notes ?? null,
        stage.created,
      );
    if (!row) {
      throw FettersError.unknown(`Stage ${stage.stage_number} for job ${stage.job_id} missing after insert`);
    }
    return row;
  }

  /**
   * Insert a stage after the job's current last stage.
   */
  append(stage: Omit<NewInterviewStage, 'stage_number'>): InterviewStageRow {
    return this.db.transaction(() =>
      this.add({ ...stage, stage_number: this.nextStageNumber(stage.job_id) }),
    );
  }

  /** `max(stage_number) + 1`, or 1 for a job without stages. */
  nextStageNumber(jobId: number): number {
    const row = this.db
      .raw()
      .prepare<[number], { max_number: number | null }>(
        'SELECT MAX(stage_number) AS max_number FROM interview_stages WHERE job_id = ?',
      )
      .get(jobId);
    return (row?.max_number ?? 0) + 1;
  }

  list(jobId: number): InterviewStageRow[] {
    return this.db
      .raw()
      .prepare<[number], InterviewStageRow>(
        'SELECT * FROM interview_stages WHERE job_id = ? ORDER BY stage_number ASC',
      )
      .all(jobId);
  }

  findById(id: number): InterviewStageRow | null {
    const row = this.db
      .raw()
      .prepare<[number], InterviewStageRow>('SELECT * FROM interview_stages WHERE id = ?')
      .get(id);
    return row ?? null;
  }

  update(id: number, changes: InterviewStageUpdate): InterviewStageRow {
    const assignments: string[] = [];
    const values: SqlValue[] = [];
    const set = (column: keyof InterviewStageUpdate, value: SqlValue | undefined): void => {
      if (value === undefined) return;
      assignments.push(`${column} = ?`);
      values.push(value);
    };

    set('name', changes.name);
    set('status', changes.status);
    set('scheduled_date', changes.scheduled_date);
    set('notes', changes.notes);

    if (assignments.length === 0) {
      const existing = this.findById(id);
      if (!existing) {
        throw FettersError.unknown(`Interview stage ${id} not found`);
      }
      return existing;
    }

    const row = this.db
      .raw()
      .prepare<SqlValue[], InterviewStageRow>(
        `UPDATE interview_stages SET ${assignments.join(', ')} WHERE id = ? RETURNING *`,
      )
      .get(...values, id);
    if (!row) {
      throw FettersError.unknown(`Interview stage ${id} not found`);
    }
    return row;
  }

  /**
   * Delete a stage and return the removed row. Leaves a gap in the job's
   * numbering until renumber() runs.
   */
  delete(id: number): InterviewStageRow {
    const row = this.db
      .raw()
      .prepare<[number], InterviewStageRow>('DELETE FROM interview_stages WHERE id = ? RETURNING *')
      .get(id);
    if (!row) {
      throw FettersError.unknown(`Interview stage ${id} not found`);
    }
    return row;
  }

  /**
   * Close gaps in a job's numbering so its stages read 1..N again. Only rows
   * whose number changes are written. Walking in ascending order only ever
   * moves a stage down into a number that is already free.
   */
  renumber(jobId: number): number {
    const update = this.db
      .raw()
      .prepare<[number, number]>('UPDATE interview_stages SET stage_number = ? WHERE id = ?');

    return this.db.transaction(() => {
      let changed = 0;
      this.list(jobId).forEach((stage, index) => {
        const expected = index + 1;
        if (stage.stage_number !== expected) {
          update.run(expected, stage.id);
          changed++;
        }
      });
      return changed;
    });
  }

  deleteAndRenumber(id: number): InterviewStageRow {
    return this.db.transaction(() => {
      const deleted = this.delete(id);
      this.renumber(deleted.job_id);
      return deleted;
    });
  }
}
