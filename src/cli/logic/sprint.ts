import type { SprintRow } from '../../db/repositories/types.js';
import { formatDate } from '../../utils/dates.js';
import type { CommandContext } from '../context.js';
import { renderSprintsTable, sprintLabel } from '../formatters/table.js';
import { writeLine } from '../utils/output.js';

export function showCurrentSprint(ctx: CommandContext): SprintRow | null {
  if (ctx.currentSprint.kind === 'none') {
    writeLine(ctx.out, 'No current sprint is set.');
    return null;
  }
  writeLine(ctx.out, `Current sprint: ${ctx.currentSprint.sprint.name}`);
  return ctx.currentSprint.sprint;
}

/**
 * Create a sprint starting today and make it current. The name defaults to
 * today's date.
 */
export function newSprint(ctx: CommandContext, name?: string): SprintRow {
  const today = formatDate(ctx.now());
  const sprint = ctx.sprints.add({ name: name ?? today, start_date: today });
  ctx.config.setCurrentSprint(sprint.name);

  writeLine(ctx.out, `Created sprint ${sprint.name} and set it as the current sprint.`);
  return sprint;
}

export function showAllSprints(ctx: CommandContext): SprintRow[] {
  const sprints = ctx.sprints.listAll();
  if (sprints.length === 0) {
    writeLine(ctx.out, 'No sprints tracked yet.');
    return sprints;
  }
  ctx.out(renderSprintsTable(sprints));
  return sprints;
}

export async function setSprint(ctx: CommandContext): Promise<SprintRow | null> {
  const sprints = ctx.sprints.listAll();
  if (sprints.length === 0) {
    writeLine(ctx.out, 'No sprints tracked yet. Run `fetters sprint new` to create one.');
    return null;
  }

  const current = ctx.currentSprint;
  const currentIndex =
    current.kind === 'sprint' ? sprints.findIndex((s) => s.id === current.sprint.id) : -1;
  const picked = await ctx.prompter.select(
    'Select the current sprint:',
    sprints.map((s) => ({ label: sprintLabel(s), value: s })),
    currentIndex === -1 ? {} : { defaultIndex: currentIndex },
  );
  if (picked === null) return null;

  ctx.config.setCurrentSprint(picked.name);
  writeLine(ctx.out, `Set current sprint to ${picked.name}.`);
  return picked;
}
