import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { showInsights } from '../../../src/cli/logic/insights.js';
import { makeTestContext, seedJob } from '../__helpers/test-context.js';
import type { TestContext } from '../__helpers/test-context.js';

describe('showInsights', () => {
  let t: TestContext;

  beforeEach(() => {
    t = makeTestContext({ currentSprint: '2025-01-15' });
  });

  afterEach(() => {
    t.ctx.db.close();
  });

  it('prints status and sprint breakdowns', () => {
    const archive = t.ctx.sprints.add({ name: 'Archive', start_date: '2024-12-01' });
    seedJob(t.ctx, { company: 'Acme' });
    seedJob(t.ctx, { company: 'Globex' });
    seedJob(t.ctx, { company: 'Initech', status: 'REJECTED' });
    seedJob(t.ctx, { company: 'Umbrella', sprint: archive });

    const insights = showInsights(t.ctx);

    expect(insights.byStatus).toEqual([
      { label: 'PENDING', count: 2, sprint_percentage: '66.67%', overall_percentage: '50.00%' },
      { label: 'REJECTED', count: 1, sprint_percentage: '33.33%', overall_percentage: '25.00%' },
    ]);
    expect(t.output()).toBe(
      [
        'Application status insights for sprint [2025-01-15]',
        '+----------+-------+----------+-----------+',
        '| Status   | Count | Sprint % | Overall % |',
        '+----------+-------+----------+-----------+',
        '| PENDING  | 2     | 66.67%   | 50.00%    |',
        '| REJECTED | 1     | 33.33%   | 25.00%    |',
        '+----------+-------+----------+-----------+',
        '',
        'Applications per sprint',
        '+------------+-------+----------+-----------+',
        '| Sprint     | Count | Sprint % | Overall % |',
        '+------------+-------+----------+-----------+',
        '| 2025-01-15 | 3     | 100.00%  | 75.00%    |',
        '| Archive    | 1     | 33.33%   | 25.00%    |',
        '+------------+-------+----------+-----------+',
        '',
      ].join('\n'),
    );
  });

  it('reports an empty current sprint instead of dividing by zero', () => {
    const archive = t.ctx.sprints.add({ name: 'Archive', start_date: '2024-12-01' });
    seedJob(t.ctx, { company: 'Umbrella', sprint: archive });

    expect(showInsights(t.ctx)).toEqual({ byStatus: [], bySprint: [] });
    expect(t.output()).toBe('No insights yet: sprint [2025-01-15] has no job applications.\n');
  });

  it('needs a current sprint', () => {
    const bare = makeTestContext();
    try {
      expect(() => showInsights(bare.ctx)).toThrow(
        'No current sprint is set. Run `fetters sprint new` or `fetters sprint set` first.',
      );
    } finally {
      bare.ctx.db.close();
    }
  });
});
