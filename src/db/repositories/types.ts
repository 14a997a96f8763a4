/**
 * Row types that match the SQL table columns exactly.
 */

export interface SprintRow {
  id: number;
  name: string;
  start_date: string;
  end_date: string | null;
  num_jobs: number;
}

export interface StatusRow {
  id: number;
  name: string;
}

export interface TitleRow {
  id: number;
  name: string;
}

export interface JobRow {
  id: number;
  created: string;
  company_name: string;
  title_id: number;
  status_id: number;
  link: string | null;
  notes: string | null;
  sprint_id: number;
}

export const STAGE_STATUSES = ['SCHEDULED', 'PASSED', 'REJECTED'] as const;

export type StageStatus = (typeof STAGE_STATUSES)[number];

export interface InterviewStageRow {
  id: number;
  job_id: number;
  stage_number: number;
  name: string | null;
  status: StageStatus;
  scheduled_date: string;
  notes: string | null;
  created: string;
}

/**
 * A job flattened with its title, status and stage count for listing.
 * `stages_count` is null when the job has no stages.
 */
export interface ListedJob {
  id: number;
  created: string;
  company_name: string;
  title: string | null;
  status: string | null;
  stages_count: number | null;
  link: string | null;
  notes: string | null;
}

/**
 * Substring filters for listing jobs. Without `sprint` the listing is scoped to
 * the current sprint. `stages: 0` keeps jobs with any stages, `N >= 1` exactly N.
 */
export interface JobFilter {
  company?: string;
  link?: string;
  notes?: string;
  sprint?: string;
  status?: string;
  title?: string;
  stages?: number;
}

/** A raw grouped count before percentages are applied. */
export interface LabelCount {
  label: string;
  count: number;
}

export interface InsightRow {
  label: string;
  count: number;
  sprint_percentage: string;
  overall_percentage: string;
}
