import type { JobUpdate } from '../../db/repositories/job-repository.js';
import type { JobFilter, JobRow, ListedJob, SprintRow } from '../../db/repositories/types.js';
import { FettersError } from '../../errors.js';
import { requireCurrentSprint } from '../../sprint/current-sprint.js';
import { formatTimestamp } from '../../utils/dates.js';
import type { CommandContext } from '../context.js';
import { jobLabel, renderJobsTable, sprintLabel } from '../formatters/table.js';
import { writeLine } from '../utils/output.js';

/** Name shown for the sprint a listing covers. */
function scopeName(filter: JobFilter, current: SprintRow): string {
  return filter.sprint ?? current.name;
}

function printJobs(ctx: CommandContext, jobs: ListedJob[], sprintName: string): void {
  writeLine(ctx.out);
  writeLine(ctx.out, `Job applications for sprint [${sprintName}]`);
  ctx.out(renderJobsTable(jobs));
  writeLine(ctx.out);
}

/**
 * Track a new application in the current sprint. The user supplies the title
 * and status; link and notes are optional.
 */
export async function addJob(ctx: CommandContext, company: string): Promise<JobRow | null> {
  const current = requireCurrentSprint(ctx.currentSprint);

  const title = await ctx.prompter.text('Enter the job title:');
  if (title === null) return null;

  const statuses = ctx.statuses.list();
  const pendingIndex = statuses.findIndex((s) => s.name === 'PENDING');
  const statusId = await ctx.prompter.select(
    'Select the application status:',
    statuses.map((s) => ({ label: s.name, value: s.id })),
    pendingIndex === -1 ? {} : { defaultIndex: pendingIndex },
  );
  if (statusId === null) return null;

  const link = await ctx.prompter.text('[OPTIONAL] Enter a link to the application:');
  const notes = await ctx.prompter.text('[OPTIONAL] Enter any notes:');

  const job = ctx.db.transaction(() =>
    ctx.jobs.add({
      company_name: company,
      created: formatTimestamp(ctx.now()),
      title_id: ctx.titles.getOrCreate(title).id,
      status_id: statusId,
      link,
      notes,
      sprint_id: current.id,
    }),
  );

  ctx.logger.debug('Added job', { id: job.id, sprint: current.name });
  writeLine(ctx.out, `Tracked a new application for ${company} in sprint [${current.name}]!`);
  return job;
}

export function listJobs(ctx: CommandContext, filter: JobFilter): ListedJob[] {
  const current = requireCurrentSprint(ctx.currentSprint);
  const jobs = ctx.jobs.list(filter, current);
  printJobs(ctx, jobs, scopeName(filter, current));
  return jobs;
}

/**
 * List the matches for a query and let the user pick one. Raises
 * NoJobsAvailable when nothing matches.
 */
export async function selectJob(ctx: CommandContext, filter: JobFilter): Promise<ListedJob | null> {
  const current = requireCurrentSprint(ctx.currentSprint);
  const jobs = ctx.jobs.list(filter, current);
  const sprintName = scopeName(filter, current);
  if (jobs.length === 0) {
    throw FettersError.noJobsAvailable(sprintName);
  }

  printJobs(ctx, jobs, sprintName);
  return ctx.prompter.select(
    'Select a job application:',
    jobs.map((job) => ({ label: jobLabel(job), value: job })),
  );
}

export async function deleteJob(ctx: CommandContext, filter: JobFilter): Promise<JobRow | null> {
  const job = await selectJob(ctx, filter);
  if (job === null) return null;

  const confirmed = await ctx.prompter.confirm(
    `Delete the application for ${job.company_name}? Its interview stages are deleted too.`,
    { defaultValue: false },
  );
  if (confirmed !== true) {
    writeLine(ctx.out, 'Cancelled.');
    return null;
  }

  const deleted = ctx.jobs.delete(job.id);
  writeLine(ctx.out, `Deleted the application for ${deleted.company_name}.`);
  return deleted;
}

export type UpdatableJobField = 'company' | 'title' | 'status' | 'link' | 'notes' | 'sprint';

const JOB_FIELD_CHOICES: { label: string; value: UpdatableJobField }[] = [
  { label: 'Company Name', value: 'company' },
  { label: 'Title', value: 'title' },
  { label: 'Status', value: 'status' },
  { label: 'Link', value: 'link' },
  { label: 'Notes', value: 'notes' },
  { label: 'Sprint', value: 'sprint' },
];

/**
 * Pick a job, pick the fields to change, then prompt for each field. A skipped
 * field prompt leaves that field as it was.
 */
export async function updateJob(ctx: CommandContext, filter: JobFilter): Promise<JobRow | null> {
  const job = await selectJob(ctx, filter);
  if (job === null) return null;

  const fields = await ctx.prompter.multiSelect('Select the fields to update:', JOB_FIELD_CHOICES);
  if (fields === null) return null;

  const changes: JobUpdate = {};
  let newTitle: string | null = null;

  for (const field of fields) {
    switch (field) {
      case 'company': {
        const value = await ctx.prompter.text('Enter the company name:', { initial: job.company_name });
        if (value !== null) changes.company_name = value;
        break;
      }
      case 'title': {
        newTitle = await ctx.prompter.text('Enter the job title:', { initial: job.title ?? undefined });
        break;
      }
      case 'status': {
        const statuses = ctx.statuses.list();
        const currentIndex = statuses.findIndex((s) => s.name === job.status);
        const value = await ctx.prompter.select(
          'Select a new status:',
          statuses.map((s) => ({ label: s.name, value: s.id })),
          currentIndex === -1 ? {} : { defaultIndex: currentIndex },
        );
        if (value !== null) changes.status_id = value;
        break;
      }
      case 'link': {
        const value = await ctx.prompter.text('Enter a link to the application:', {
          initial: job.link ?? undefined,
        });
        if (value !== null) changes.link = value;
        break;
      }
      case 'notes': {
        const value = await ctx.prompter.text('Enter notes:', { initial: job.notes ?? undefined });
        if (value !== null) changes.notes = value;
        break;
      }
      case 'sprint': {
        const sprints = ctx.sprints.listAll();
        const value = await ctx.prompter.select(
          'Select the sprint for this application:',
          sprints.map((s) => ({ label: sprintLabel(s), value: s.id })),
        );
        if (value !== null) changes.sprint_id = value;
        break;
      }
    }
  }

  const updated = ctx.db.transaction(() => {
    if (newTitle !== null) {
      changes.title_id = ctx.titles.getOrCreate(newTitle).id;
    }
    return ctx.jobs.update(job.id, changes);
  });

  writeLine(ctx.out, `Updated the application for ${updated.company_name}!`);
  return updated;
}

/**
 * Hand the selected job's link to the desktop opener.
 */
export async function openJob(ctx: CommandContext, filter: JobFilter): Promise<string | null> {
  const job = await selectJob(ctx, filter);
  if (job === null) return null;

  if (job.link === null || job.link === '') {
    writeLine(ctx.out, `No link is tracked for ${job.company_name}.`);
    return null;
  }

  await ctx.host.open(job.link);
  ctx.logger.debug('Opened link', { id: job.id, link: job.link });
  return job.link;
}
