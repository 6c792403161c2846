/**
 * Renders a dry-run plan, with line diffs for issue bodies that would change
 */

import chalk from 'chalk';
import { diffLines } from 'diff';
import { PlannedChange, PlannedIssueState } from './types';

const CONTEXT_LINES = 2;

/**
 * Body diff with a little unchanged context around each change
 */
export function renderBodyDiff(before: string, after: string): string[] {
  if (before === after) {
    return [];
  }

  const parts = diffLines(before, after);
  const lines: string[] = [];

  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];
    if (!part.added && !part.removed) {
      continue;
    }

    const previous = parts[i - 1];
    if (previous && !previous.added && !previous.removed) {
      splitLines(previous.value).slice(-CONTEXT_LINES).forEach((line) => lines.push(chalk.gray('    ' + line)));
    }

    const marker = part.added ? '  + ' : '  - ';
    const color = part.added ? chalk.green : chalk.red;
    splitLines(part.value).forEach((line) => lines.push(color(marker + line)));

    const next = parts[i + 1];
    if (next && !next.added && !next.removed) {
      splitLines(next.value).slice(0, CONTEXT_LINES).forEach((line) => lines.push(chalk.gray('    ' + line)));
    }
  }

  return lines;
}

/**
 * Milestone, deadline, label and body differences of a planned update
 */
export function renderIssueChanges(current: PlannedIssueState, target: PlannedIssueState): string[] {
  const lines: string[] = [];

  if (current.milestone !== target.milestone) {
    lines.push(chalk.yellow(`    milestone: ${formatName(current.milestone)} → ${formatName(target.milestone)}`));
  }
  if (formatDate(current.dueDate) !== formatDate(target.dueDate)) {
    lines.push(chalk.yellow(`    due date: ${formatDate(current.dueDate)} → ${formatDate(target.dueDate)}`));
  }

  target.labels
    .filter((label) => !current.labels.includes(label))
    .forEach((label) => lines.push(chalk.green(`  + label "${label}"`)));
  current.labels
    .filter((label) => !target.labels.includes(label))
    .forEach((label) => lines.push(chalk.red(`  - label "${label}"`)));

  lines.push(...renderBodyDiff(current.body, target.body));
  return lines;
}

/**
 * Creations always change the destination; updates only when a field differs
 */
export function hasChanges(change: PlannedChange): boolean {
  if (change.action === 'create') {
    return true;
  }
  if (!change.current || !change.target) {
    return false;
  }
  return renderIssueChanges(change.current, change.target).length > 0;
}

/**
 * One line per planned change, followed by field differences for updates
 */
export function renderPlan(plan: PlannedChange[]): string[] {
  if (!plan.some(hasChanges)) {
    return [chalk.green('✓ Destination is up to date')];
  }

  const lines: string[] = [];
  for (const change of plan) {
    if (change.action === 'create') {
      lines.push(chalk.green(`+ create ${change.kind} "${change.name}"`));
      continue;
    }

    const details = change.current && change.target ? renderIssueChanges(change.current, change.target) : [];
    if (details.length === 0) {
      lines.push(chalk.gray(`= unchanged ${change.kind} #${change.index ?? '?'} "${change.name}"`));
      continue;
    }

    lines.push(chalk.blue(`~ update ${change.kind} #${change.index ?? '?'} "${change.name}"`));
    lines.push(...details);
  }

  return lines;
}

function formatName(name: string | null): string {
  return name === null ? 'none' : `"${name}"`;
}

function formatDate(date: Date | null): string {
  return date ? date.toISOString().slice(0, 10) : 'none';
}

function splitLines(value: string): string[] {
  return value.split('\n').filter((line) => line !== '');
}
