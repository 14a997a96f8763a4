/**
 * SQL statements that build the tracker tables. Migrations run in order and
 * each one is recorded in schema_migrations, so a step is applied once per file.
 */

export const CREATE_SCHEMA_MIGRATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS schema_migrations (
  name TEXT PRIMARY KEY NOT NULL,
  applied_at TEXT NOT NULL
)`;

export const CREATE_SPRINTS_TABLE = `
CREATE TABLE IF NOT EXISTS sprints (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT UNIQUE NOT NULL,
  start_date TEXT NOT NULL,
  end_date TEXT,
  num_jobs INTEGER NOT NULL DEFAULT 0 CHECK (num_jobs >= 0)
)`;

export const CREATE_STATUSES_TABLE = `
CREATE TABLE IF NOT EXISTS statuses (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT UNIQUE NOT NULL
)`;

export const CREATE_TITLES_TABLE = `
CREATE TABLE IF NOT EXISTS titles (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT UNIQUE NOT NULL
)`;

export const CREATE_JOBS_TABLE = `
CREATE TABLE IF NOT EXISTS jobs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  created TEXT NOT NULL,
  company_name TEXT NOT NULL,
  title_id INTEGER NOT NULL REFERENCES titles(id),
  status_id INTEGER NOT NULL REFERENCES statuses(id),
  link TEXT,
  notes TEXT,
  sprint_id INTEGER NOT NULL REFERENCES sprints(id)
)`;

export const CREATE_INTERVIEW_STAGES_TABLE = `
CREATE TABLE IF NOT EXISTS interview_stages (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  job_id INTEGER NOT NULL REFERENCES jobs(id) ON DELETE CASCADE,
  stage_number INTEGER NOT NULL CHECK (stage_number >= 1),
  name TEXT,
  status TEXT NOT NULL DEFAULT 'SCHEDULED' CHECK (status IN ('SCHEDULED', 'PASSED', 'REJECTED')),
  scheduled_date TEXT NOT NULL,
  notes TEXT,
  created TEXT NOT NULL,
  UNIQUE (job_id, stage_number)
)`;

export const CREATE_JOBS_SPRINT_INDEX = `CREATE INDEX IF NOT EXISTS idx_jobs_sprint_id ON jobs(sprint_id)`;
export const CREATE_INTERVIEW_STAGES_JOB_INDEX = `CREATE INDEX IF NOT EXISTS idx_interview_stages_job_id ON interview_stages(job_id)`;

export interface Migration {
  name: string;
  statements: readonly string[];
}

export const MIGRATIONS: readonly Migration[] = [
  {
    name: '0001_create_tracker_tables',
    statements: [
      CREATE_SPRINTS_TABLE,
      CREATE_STATUSES_TABLE,
      CREATE_TITLES_TABLE,
      CREATE_JOBS_TABLE,
      CREATE_JOBS_SPRINT_INDEX,
    ],
  },
  {
    name: '0002_add_interview_stage_tracking',
    statements: [CREATE_INTERVIEW_STAGES_TABLE, CREATE_INTERVIEW_STAGES_JOB_INDEX],
  },
];
