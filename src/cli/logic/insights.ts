import type { InsightRow } from '../../db/repositories/types.js';
import { requireCurrentSprint } from '../../sprint/current-sprint.js';
import type { CommandContext } from '../context.js';
import { renderInsightsTable } from '../formatters/table.js';
import { writeLine } from '../utils/output.js';

export interface Insights {
  byStatus: InsightRow[];
  bySprint: InsightRow[];
}

export function showInsights(ctx: CommandContext): Insights {
  const current = requireCurrentSprint(ctx.currentSprint);
  const byStatus = ctx.jobs.countPerStatus(current);
  const bySprint = ctx.jobs.countPerSprint(current);

  if (byStatus.length === 0 && bySprint.length === 0) {
    writeLine(ctx.out, `No insights yet: sprint [${current.name}] has no job applications.`);
    return { byStatus, bySprint };
  }

  writeLine(ctx.out, `Application status insights for sprint [${current.name}]`);
  ctx.out(renderInsightsTable('Status', byStatus));
  writeLine(ctx.out);
  writeLine(ctx.out, 'Applications per sprint');
  ctx.out(renderInsightsTable('Sprint', bySprint));
  return { byStatus, bySprint };
}
