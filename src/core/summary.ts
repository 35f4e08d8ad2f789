/**
 * core/summary.ts
 *
 * Plain-text renderings of engine output for the one-shot CLI.
 * `--json` bypasses all of this and prints the raw objects.
 */

import {
  ApplyReport,
  CATEGORIES,
  EngineStatus,
  RestorePlan,
  RestoreReport,
  TweakResult,
  TweakStatus
} from './types';

const OUTCOME_LABEL: Record<string, string> = {
  applied: 'applied',
  restored: 'restored',
  skipped_insufficient_privilege: 'skipped',
  failed: 'failed',
  not_found: 'unknown'
};

function resultLine(result: TweakResult<string>): string {
  const label = (OUTCOME_LABEL[result.outcome] ?? result.outcome).padEnd(9);
  let suffix = '';
  if (result.outcome === 'skipped_insufficient_privilege') suffix = ' (requires administrator)';
  else if (result.error) suffix = `: [${result.error.code}] ${result.error.message}`;
  return `  ${label}${result.id}${suffix}`;
}

function countOf(results: Array<TweakResult<string>>, outcome: string): number {
  return results.filter(r => r.outcome === outcome).length;
}

function trailer(report: { cancelled: boolean; aborted: boolean }): string[] {
  const lines: string[] = [];
  if (report.cancelled) lines.push('Cancelled before every tweak ran.');
  if (report.aborted) lines.push('Stopped early: the applied-tweaks record could not be written.');
  return lines;
}

export function formatApplyReport(report: ApplyReport): string {
  const { results } = report;
  const header =
    `Applied ${countOf(results, 'applied')}, ` +
    `skipped ${countOf(results, 'skipped_insufficient_privilege')}, ` +
    `failed ${countOf(results, 'failed')}, ` +
    `unknown ${countOf(results, 'not_found')}`;
  return [header, ...results.map(resultLine), ...trailer(report)].join('\n');
}

export function formatRestoreReport(report: RestoreReport): string {
  if (report.nothingToRestore) return 'Nothing to restore.';
  const { results } = report;
  const header =
    `Restored ${countOf(results, 'restored')}, ` +
    `skipped ${countOf(results, 'skipped_insufficient_privilege')}, ` +
    `failed ${countOf(results, 'failed')}`;
  return [header, ...results.map(resultLine), ...trailer(report)].join('\n');
}

/**
 * Catalog listing grouped by category, in display order.
 * `[x]` marks a recorded tweak; ADMIN and ONE-WAY flag the tweaks a user
 * most needs to know about before selecting them.
 */
export function formatCatalog(tweaks: TweakStatus[]): string {
  const lines: string[] = [];
  for (const category of CATEGORIES) {
    const group = tweaks.filter(t => t.category === category);
    if (group.length === 0) continue;
    if (lines.length > 0) lines.push('');
    lines.push(category);
    for (const t of group) {
      const markers: string[] = [];
      if (t.requiresElevation) markers.push('ADMIN');
      if (!t.reversible) markers.push('ONE-WAY');
      const flags = markers.length > 0 ? `  [${markers.join(', ')}]` : '';
      lines.push(`  ${t.applied ? '[x]' : '[ ]'} ${t.id} - ${t.name}${flags}`);
    }
  }
  return lines.join('\n');
}

export function formatPlan(plan: RestorePlan): string {
  const section = (title: string, ids: string[]) =>
    ids.length === 0 ? [`${title}: none`] : [`${title}:`, ...ids.map(id => `  ${id}`)];
  return [
    ...section('Will restore', plan.restorable),
    ...section('Cannot restore (kept in record)', plan.unknown),
    ...section('One-way, never restored', plan.oneWay)
  ].join('\n');
}

export function formatStatus(status: EngineStatus): string {
  const lines = [
    `Elevated: ${status.elevated ? 'yes' : 'no'}`,
    `Applied tweaks: ${status.appliedCount} of ${status.catalogSize}`
  ];
  if (status.foreignKeys.length > 0) {
    lines.push(`Unrecognised record entries: ${status.foreignKeys.join(', ')}`);
  }
  return lines.join('\n');
}
