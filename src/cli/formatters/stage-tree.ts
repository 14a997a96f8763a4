import type { InterviewStageRow } from '../../db/repositories/types.js';

export interface TreeNode {
  label: string;
  children: TreeNode[];
}

/** Stage fields the tree shows; a stage being previewed has no row yet. */
export type StageView = Pick<
  InterviewStageRow,
  'stage_number' | 'name' | 'status' | 'scheduled_date' | 'notes'
> & { id: number | null };

export interface StageHighlight {
  /** Stage id to mark, or null for the unsaved preview stage. */
  id: number | null;
  marker: string;
}

function renderChildren(nodes: TreeNode[], prefix: string, lines: string[]): void {
  nodes.forEach((node, index) => {
    const last = index === nodes.length - 1;
    lines.push(`${prefix}${last ? '└── ' : '├── '}${node.label}`);
    renderChildren(node.children, `${prefix}${last ? '    ' : '│   '}`, lines);
  });
}

export function renderTree(root: TreeNode): string {
  const lines = [root.label];
  renderChildren(root.children, '', lines);
  return lines.join('\n') + '\n';
}

export function stageLabel(stage: Pick<StageView, 'stage_number' | 'name'>): string {
  return stage.name ? `Stage ${stage.stage_number}: ${stage.name}` : `Stage ${stage.stage_number}`;
}

/**
 * Tree of a job's interview stages: one branch per stage holding its status,
 * date and notes.
 */
export function buildStageTree(
  job: { company_name: string; title: string | null },
  stages: StageView[],
  highlight?: StageHighlight,
): TreeNode {
  return {
    label: `${job.company_name} - ${job.title ?? 'N/A'}`,
    children: stages.map((stage) => {
      const marker = highlight !== undefined && highlight.id === stage.id ? highlight.marker : null;
      const children: TreeNode[] = [
        { label: `[${stage.status}] ${stage.scheduled_date}`, children: [] },
      ];
      if (stage.notes) {
        children.push({ label: stage.notes, children: [] });
      }
      return {
        label: marker === null ? stageLabel(stage) : `${stageLabel(stage)} ${marker}`,
        children,
      };
    }),
  };
}

export function renderStageTree(
  job: { company_name: string; title: string | null },
  stages: StageView[],
  highlight?: StageHighlight,
): string {
  return renderTree(buildStageTree(job, stages, highlight));
}
