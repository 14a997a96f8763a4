import type { InterviewStageUpdate } from '../../db/repositories/interview-stage-repository.js';
import { STAGE_STATUSES } from '../../db/repositories/types.js';
import type {
  InterviewStageRow,
  JobFilter,
  ListedJob,
  StageStatus,
} from '../../db/repositories/types.js';
import { requireCurrentSprint } from '../../sprint/current-sprint.js';
import { formatStageDate, formatTimestamp, parseStageDate } from '../../utils/dates.js';
import type { CommandContext } from '../context.js';
import { renderStageTree, stageLabel } from '../formatters/stage-tree.js';
import type { StageView } from '../formatters/stage-tree.js';
import { isEmptyFilter } from '../options.js';
import { writeLine } from '../utils/output.js';
import { selectJob } from './jobs.js';

const DATE_PROMPTS: Record<StageStatus, string> = {
  SCHEDULED: 'Select the scheduled date:',
  PASSED: 'Select the passed date:',
  REJECTED: 'Select the rejected date:',
};

const STATUS_CHOICES = STAGE_STATUSES.map((status) => ({ label: status, value: status }));

function printTree(
  ctx: CommandContext,
  job: ListedJob,
  stages: StageView[],
  highlight?: { id: number | null; marker: string },
): void {
  writeLine(ctx.out);
  ctx.out(renderStageTree(job, stages, highlight));
  writeLine(ctx.out);
}

function loadStages(ctx: CommandContext, job: ListedJob): InterviewStageRow[] | null {
  const stages = ctx.stages.list(job.id);
  if (stages.length === 0) {
    writeLine(ctx.out, `No interview stages tracked for ${job.company_name}.`);
    return null;
  }
  return stages;
}

function selectStage(
  ctx: CommandContext,
  message: string,
  stages: InterviewStageRow[],
): Promise<InterviewStageRow | null> {
  return ctx.prompter.select(
    message,
    stages.map((stage) => ({ label: `${stageLabel(stage)} [${stage.status}] ${stage.scheduled_date}`, value: stage })),
  );
}

/**
 * Append a stage to a job. The new stage is previewed in the job's tree and
 * only saved once confirmed.
 */
export async function addStage(ctx: CommandContext, filter: JobFilter): Promise<InterviewStageRow | null> {
  const job = await selectJob(ctx, filter);
  if (job === null) return null;

  const name = await ctx.prompter.text('[OPTIONAL] Enter a name for this stage (e.g. Phone Screen):');
  const status = await ctx.prompter.select('Select the status for this stage:', STATUS_CHOICES);
  if (status === null) return null;
  const date = await ctx.prompter.date(DATE_PROMPTS[status]);
  if (date === null) return null;
  const notes = await ctx.prompter.text('[OPTIONAL] Enter any notes for this stage:');

  const existing = ctx.stages.list(job.id);
  const preview: StageView = {
    id: null,
    stage_number: ctx.stages.nextStageNumber(job.id),
    name,
    status,
    scheduled_date: formatStageDate(date),
    notes,
  };
  printTree(ctx, job, [...existing, preview], { id: null, marker: '(new)' });

  const confirmed = await ctx.prompter.confirm('Confirm new stage?');
  if (confirmed !== true) {
    writeLine(ctx.out, 'Cancelled.');
    return null;
  }

  const stage = ctx.stages.append({
    job_id: job.id,
    name,
    status,
    scheduled_date: preview.scheduled_date,
    notes,
    created: formatTimestamp(ctx.now()),
  });
  writeLine(ctx.out, `Added stage ${stage.stage_number} for ${job.company_name}!`);
  return stage;
}

/**
 * Delete a stage and close the gap in the job's numbering.
 */
export async function deleteStage(ctx: CommandContext, filter: JobFilter): Promise<InterviewStageRow | null> {
  const job = await selectJob(ctx, filter);
  if (job === null) return null;

  const stages = loadStages(ctx, job);
  if (stages === null) return null;

  const selected = await selectStage(ctx, 'Select the stage to delete:', stages);
  if (selected === null) return null;

  printTree(ctx, job, stages, { id: selected.id, marker: '(delete)' });
  const confirmed = await ctx.prompter.confirm('Confirm deletion?');
  if (confirmed !== true) {
    writeLine(ctx.out, 'Cancelled.');
    return null;
  }

  const deleted = ctx.stages.deleteAndRenumber(selected.id);
  writeLine(ctx.out, `Deleted stage ${deleted.stage_number} from ${job.company_name}!`);
  return deleted;
}

/**
 * Without query flags, print the tree of every job in the current sprint that
 * has stages. With flags, pick one matching job and print its tree.
 */
export async function showStageTree(ctx: CommandContext, filter: JobFilter): Promise<ListedJob[]> {
  const scoped: JobFilter = { ...filter, stages: filter.stages ?? 0 };

  if (isEmptyFilter(filter)) {
    const current = requireCurrentSprint(ctx.currentSprint);
    const jobs = ctx.jobs.list(scoped, current);
    if (jobs.length === 0) {
      writeLine(ctx.out, `No interview stages tracked for sprint [${current.name}].`);
      return [];
    }
    for (const job of jobs) {
      printTree(ctx, job, ctx.stages.list(job.id));
    }
    return jobs;
  }

  const job = await selectJob(ctx, scoped);
  if (job === null) return [];
  const stages = loadStages(ctx, job);
  if (stages === null) return [];
  printTree(ctx, job, stages);
  return [job];
}

type UpdatableStageField = 'name' | 'status' | 'date' | 'notes';

const STAGE_FIELD_CHOICES: { label: string; value: UpdatableStageField }[] = [
  { label: 'Name', value: 'name' },
  { label: 'Status', value: 'status' },
  { label: 'Date', value: 'date' },
  { label: 'Notes', value: 'notes' },
];

export async function updateStage(ctx: CommandContext, filter: JobFilter): Promise<InterviewStageRow | null> {
  const job = await selectJob(ctx, filter);
  if (job === null) return null;

  const stages = loadStages(ctx, job);
  if (stages === null) return null;

  const selected = await selectStage(ctx, 'Select the stage to update:', stages);
  if (selected === null) return null;

  const fields = await ctx.prompter.multiSelect('Select the fields to update:', STAGE_FIELD_CHOICES);
  if (fields === null) return null;

  const changes: InterviewStageUpdate = {};
  for (const field of fields) {
    switch (field) {
      case 'name': {
        const value = await ctx.prompter.text('Enter a new name for this stage:', {
          initial: selected.name ?? undefined,
        });
        if (value !== null) changes.name = value;
        break;
      }
      case 'status': {
        const value = await ctx.prompter.select('Select a new status:', STATUS_CHOICES);
        if (value !== null) changes.status = value;
        break;
      }
      case 'date': {
        const status = changes.status ?? selected.status;
        const value = await ctx.prompter.date(DATE_PROMPTS[status], {
          initial: parseStageDate(selected.scheduled_date) ?? ctx.now(),
        });
        if (value !== null) changes.scheduled_date = formatStageDate(value);
        break;
      }
      case 'notes': {
        const value = await ctx.prompter.text('Enter new notes for this stage:', {
          initial: selected.notes ?? undefined,
        });
        if (value !== null) changes.notes = value;
        break;
      }
    }
  }

  const preview = stages.map((stage) => (stage.id === selected.id ? { ...stage, ...changes } : stage));
  printTree(ctx, job, preview, { id: selected.id, marker: '(updated)' });

  const confirmed = await ctx.prompter.confirm('Confirm updates?');
  if (confirmed !== true) {
    writeLine(ctx.out, 'Cancelled.');
    return null;
  }

  const updated = ctx.stages.update(selected.id, changes);
  writeLine(ctx.out, `Updated stage ${updated.stage_number} for ${job.company_name}!`);
  return updated;
}
