/**
 * Run Summary
 *
 * Formats the end-of-run report and the dry-run plan.
 */

import type { InstallResult, Outcome, PlannedStep, RunReport } from '../types/index.js';
import type { Plan } from '../provision/orchestrator.js';
import { describePlatform } from '../provision/platform.js';

const SEPARATOR = '━'.repeat(60);

const OUTCOME_LABELS: Record<Outcome, string> = {
  alreadyPresent: '[OK]     ',
  installed: '[NEW]    ',
  skipped: '[SKIP]   ',
  failed: '[FAILED] ',
};

function countBy(results: readonly InstallResult[], outcome: Outcome): number {
  return results.filter((result) => result.outcome === outcome).length;
}

/**
 * Format the final summary of a run
 */
export function formatRunSummary(report: RunReport): string {
  const lines: string[] = [];

  lines.push('PROVISIONING SUMMARY - ' + describePlatform(report.platform));
  lines.push(SEPARATOR);

  for (const result of report.results) {
    let line = '  ' + OUTCOME_LABELS[result.outcome] + result.tool;
    if (result.outcome === 'skipped' && result.detail) line += ' (' + result.detail + ')';
    lines.push(line);
    if (result.outcome === 'failed' && result.detail) {
      lines.push('           → ' + result.detail);
    }
  }

  lines.push(SEPARATOR);
  const { results } = report;
  lines.push(
    '  ' +
      countBy(results, 'installed') + ' installed, ' +
      countBy(results, 'alreadyPresent') + ' already present, ' +
      countBy(results, 'skipped') + ' skipped, ' +
      countBy(results, 'failed') + ' failed'
  );

  if (!report.success) {
    lines.push('');
    lines.push('  Re-run to retry the failed tools; installed tools will be skipped.');
  }

  return lines.join('\n');
}

const PLAN_LABELS: Record<PlannedStep['action'], string> = {
  alreadyPresent: '[OK]      ',
  install: '[INSTALL] ',
  skip: '[SKIP]    ',
};

/**
 * Format a dry-run plan
 */
export function formatPlan(plan: Plan): string {
  const lines: string[] = [];

  lines.push('DRY RUN - ' + describePlatform(plan.platform));
  lines.push(SEPARATOR);

  for (const step of plan.steps) {
    const suffix = step.action === 'alreadyPresent' ? '' : ' (' + step.detail + ')';
    lines.push('  ' + PLAN_LABELS[step.action] + step.tool + suffix);
  }

  lines.push(SEPARATOR);
  const toInstall = plan.steps.filter((step) => step.action === 'install').length;
  lines.push('  ' + toInstall + ' to install, nothing was changed');

  return lines.join('\n');
}
