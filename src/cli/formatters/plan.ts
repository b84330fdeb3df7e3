/**
 * Human-readable rendering of generation plans.
 */
import chalk from 'chalk';
import type { GenerationPlan, PlanAction, PlannedFile } from '../../core/generate/types.js';

export interface PlanFormatOptions {
  /** Use colors in output (default: true) */
  colors?: boolean;
  /** Include files that will not change (default: false) */
  showIdentical?: boolean;
}

type Paint = (text: string) => string;

const ACTIONS: Record<PlanAction, { symbol: string; paint: Paint }> = {
  create: { symbol: '+', paint: chalk.green },
  update: { symbol: '~', paint: chalk.cyan },
  identical: { symbol: '=', paint: chalk.dim },
  conflict: { symbol: '!', paint: chalk.red },
  skip: { symbol: '-', paint: chalk.yellow },
  stale: { symbol: 'x', paint: chalk.magenta },
};

const ORDER: PlanAction[] = ['create', 'update', 'identical', 'conflict', 'skip', 'stale'];

/**
 * One line per file: `<symbol> <action> <path>`.
 */
export function formatPlanEntry(file: PlannedFile, options: PlanFormatOptions = {}): string {
  const { symbol, paint } = ACTIONS[file.action];
  const line = `${symbol} ${file.action.padEnd(9)} ${file.path}`;
  const note = file.action === 'stale' && file.modified ? ' (modified)' : '';
  return options.colors === false ? line + note : paint(line) + note;
}

/**
 * Counts per action, in a fixed order, zero counts left out:
 * `2 create, 1 conflict`.
 */
export function formatPlanSummary(plan: GenerationPlan): string {
  const counts = new Map<PlanAction, number>();
  for (const file of plan.files) {
    counts.set(file.action, (counts.get(file.action) ?? 0) + 1);
  }
  const parts = ORDER.filter((action) => counts.has(action)).map(
    (action) => `${counts.get(action) ?? 0} ${action}`
  );
  return parts.length > 0 ? parts.join(', ') : 'no files';
}

export function formatPlan(plan: GenerationPlan, options: PlanFormatOptions = {}): string {
  const lines = plan.files
    .filter((file) => options.showIdentical || file.action !== 'identical')
    .map((file) => `  ${formatPlanEntry(file, options)}`);
  lines.push(formatPlanSummary(plan));
  return lines.join('\n');
}
