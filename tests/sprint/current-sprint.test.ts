import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FettersDatabase, IN_MEMORY } from '../../src/db/database.js';
import { SprintRepository } from '../../src/db/repositories/index.js';
import { requireCurrentSprint, resolveCurrentSprint } from '../../src/sprint/current-sprint.js';

describe('resolveCurrentSprint', () => {
  let db: FettersDatabase;
  let sprints: SprintRepository;

  beforeEach(() => {
    db = new FettersDatabase(IN_MEMORY);
    sprints = new SprintRepository(db, () => new Date(2025, 0, 15));
  });

  afterEach(() => {
    db.close();
  });

  it('reports no sprint for an empty name', () => {
    expect(resolveCurrentSprint({ current_sprint_name: '' }, sprints)).toEqual({ kind: 'none' });
    expect(resolveCurrentSprint({ current_sprint_name: '   ' }, sprints)).toEqual({ kind: 'none' });
    expect(sprints.listAll()).toEqual([]);
  });

  it('creates the named sprint on first use', () => {
    const current = resolveCurrentSprint({ current_sprint_name: 'winter' }, sprints);
    const sprint = requireCurrentSprint(current);
    expect(sprint.name).toBe('winter');
    expect(sprint.start_date).toBe('2025-01-15');
  });

  it('returns the existing sprint afterwards', () => {
    const existing = sprints.add({ name: 'winter', start_date: '2024-12-01' });
    const sprint = requireCurrentSprint(
      resolveCurrentSprint({ current_sprint_name: 'winter' }, sprints),
    );
    expect(sprint).toEqual(existing);
  });

  it('raises NoCurrentSprint when required but missing', () => {
    expect(() => requireCurrentSprint({ kind: 'none' })).toThrow(
      'No current sprint is set. Run `fetters sprint new` or `fetters sprint set` first.',
    );
  });
});
