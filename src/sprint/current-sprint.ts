import { FettersError } from '../errors.js';
import type { FettersConfig } from '../config/schema.js';
import type { SprintRepository } from '../db/repositories/sprint-repository.js';
import type { SprintRow } from '../db/repositories/types.js';

export type CurrentSprint =
  | { kind: 'none' }
  | { kind: 'sprint'; sprint: SprintRow };

/**
 * Map the configured `current_sprint_name` to a sprint row, creating the
 * sprint on first use. An empty name means no sprint has been chosen yet.
 */
export function resolveCurrentSprint(
  config: FettersConfig,
  sprints: SprintRepository,
): CurrentSprint {
  const name = config.current_sprint_name;
  if (name.trim() === '') {
    return { kind: 'none' };
  }
  return { kind: 'sprint', sprint: sprints.getOrCreateByName(name) };
}

export function requireCurrentSprint(current: CurrentSprint): SprintRow {
  if (current.kind === 'none') {
    throw FettersError.noCurrentSprint();
  }
  return current.sprint;
}
