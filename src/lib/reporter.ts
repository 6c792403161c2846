/**
 * Progress reporting for migration runs
 */

import chalk from 'chalk';
import { ReferenceWarning } from './reference-resolver';
import { EntityKind, MigrationPhase, MigrationResult, PhaseCounts } from './types';

/**
 * Everything the engine has to say goes through this interface
 */
export interface MigrationReporter {
  phaseStarted(phase: MigrationPhase): void;
  phaseFinished(phase: MigrationPhase, counts: PhaseCounts): void;
  created(kind: EntityKind, name: string, dryRun: boolean): void;
  updated(kind: EntityKind, name: string, dryRun: boolean): void;
  skipped(kind: EntityKind, name: string): void;
  referenceWarning(issueTitle: string, warning: ReferenceWarning): void;
  partialUpdate(issueTitle: string, index: number, reason: string): void;
  debug(message: string): void;
}

export interface ConsoleReporterOptions {
  verbose?: boolean;
  write?: (line: string) => void;
}

export class ConsoleReporter implements MigrationReporter {
  private verbose: boolean;
  private write: (line: string) => void;

  constructor(options: ConsoleReporterOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.write = options.write ?? ((line) => console.log(line));
  }

  phaseStarted(phase: MigrationPhase): void {
    this.write(chalk.bold(`\nMigrating ${phase}`));
  }

  phaseFinished(phase: MigrationPhase, counts: PhaseCounts): void {
    this.write(chalk.gray(`  ${phase}: ${formatCounts(counts)}`));
  }

  created(kind: EntityKind, name: string, dryRun: boolean): void {
    const verb = dryRun ? 'Would create' : 'Created';
    this.write(chalk.green(`  ✓ ${verb} ${kind} "${name}"`));
  }

  updated(kind: EntityKind, name: string, dryRun: boolean): void {
    const verb = dryRun ? 'Would update' : 'Updated';
    this.write(chalk.blue(`  ✓ ${verb} ${kind} "${name}"`));
  }

  skipped(kind: EntityKind, name: string): void {
    if (this.verbose) {
      this.write(chalk.gray(`  ⊘ Skipped ${kind} "${name}" (already exists)`));
    }
  }

  referenceWarning(issueTitle: string, warning: ReferenceWarning): void {
    const what = warning.kind === 'unknown-milestone' ? 'milestone' : 'label';
    this.write(chalk.yellow(`  ⚠ Unknown ${what} "${warning.value}" on issue "${issueTitle}"`));
  }

  partialUpdate(issueTitle: string, index: number, reason: string): void {
    this.write(
      chalk.red(`  ✗ Issue #${index} "${issueTitle}" was updated but its labels were not replaced: ${reason}`)
    );
  }

  debug(message: string): void {
    if (this.verbose) {
      this.write(chalk.gray(`  ${message}`));
    }
  }
}

export function formatCounts(counts: PhaseCounts): string {
  const parts = [`${counts.created} created`, `${counts.updated} updated`, `${counts.skipped} skipped`];
  if (counts.warnings > 0) {
    parts.push(`${counts.warnings} warning(s)`);
  }
  return parts.join(', ');
}

/**
 * Print migration result summary
 */
export function printMigrationResult(result: MigrationResult, write: (line: string) => void = console.log): void {
  write(chalk.bold('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  write(chalk.bold.cyan(result.dryRun ? 'Migration Plan' : 'Migration Results'));
  write(chalk.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n'));

  const phases: MigrationPhase[] = ['milestones', 'labels', 'issues'];
  for (const phase of phases) {
    const counts = result[phase];
    const line = `${phase.padEnd(11)} ${formatCounts(counts)}`;
    write(counts.warnings > 0 ? chalk.yellow(line) : chalk.green(line));
  }

  write('');
}
