/**
 * Migration engine: milestones, then labels, then open issues
 *
 * Milestones and labels are created when their title/name is missing at the
 * destination. Issues are created when their title is missing and updated in
 * place otherwise. Destination lookup tables are fetched once per phase.
 */

import { describeError, MigrationError, wrapError } from './errors';
import { resolveReferences } from './reference-resolver';
import { MigrationReporter } from './reporter';
import {
  Destination,
  Issue,
  IssuePayload,
  Label,
  LookupTable,
  MigrationPhase,
  MigrationResult,
  MigrationState,
  Milestone,
  PhaseCounts,
  PlannedChange,
  PlannedIssueState,
  SourceReader,
} from './types';

export interface MigrationOptions {
  /** Report what would change without calling any destination mutator */
  dryRun?: boolean;
  /** Source project path; when set, issue bodies get a "Migrated from" footer */
  sourceReference?: string | null;
  /** Retry a failed label replacement once after the issue fields were updated */
  retryLabelReplace?: boolean;
}

interface IssueTables {
  issues: LookupTable<Issue>;
  milestones: LookupTable<Milestone>;
  labels: LookupTable<Label>;
}

export class MigrationEngine {
  private source: SourceReader;
  private destination: Destination;
  private reporter: MigrationReporter;
  private options: MigrationOptions;
  private state: MigrationState = 'init';
  private plan: PlannedChange[] = [];
  // dry run only: names planned for creation, visible to the issue phase
  private pendingMilestones = new Set<string>();
  private pendingLabels = new Set<string>();

  constructor(
    source: SourceReader,
    destination: Destination,
    reporter: MigrationReporter,
    options: MigrationOptions = {}
  ) {
    this.source = source;
    this.destination = destination;
    this.reporter = reporter;
    this.options = options;
  }

  getState(): MigrationState {
    return this.state;
  }

  /**
   * Run all three phases; the first failure aborts the remaining ones
   */
  async migrate(): Promise<MigrationResult> {
    if (this.state !== 'init') {
      throw new Error(`Migration engine already ran (state: ${this.state})`);
    }

    const milestones = await this.runPhase('milestones', () => this.migrateMilestones());
    const labels = await this.runPhase('labels', () => this.migrateLabels());
    const issues = await this.runPhase('issues', () => this.migrateIssues());

    this.state = 'done';

    return {
      dryRun: this.isDryRun(),
      milestones,
      labels,
      issues,
      plan: this.plan,
    };
  }

  private async runPhase(phase: MigrationPhase, run: () => Promise<PhaseCounts>): Promise<PhaseCounts> {
    this.state = phase;
    this.reporter.phaseStarted(phase);

    try {
      const counts = await run();
      this.reporter.phaseFinished(phase, counts);
      return counts;
    } catch (error) {
      this.state = 'failed';
      throw new MigrationError(phase, error);
    }
  }

  private async migrateMilestones(): Promise<PhaseCounts> {
    const existing = await this.destination.listAllMilestones();
    const created = new Set<string>();
    const counts = emptyCounts();

    for await (const page of this.source.listOpenMilestones()) {
      this.reporter.debug(`Source milestones page ${page.number}: ${page.items.length} item(s)`);

      for (const milestone of page.items) {
        if (existing.has(milestone.title) || created.has(milestone.title)) {
          counts.skipped++;
          this.reporter.skipped('milestone', milestone.title);
          continue;
        }

        const options = {
          title: milestone.title,
          description: milestone.description,
          dueDate: milestone.dueDate,
        };

        if (this.isDryRun()) {
          this.plan.push({ kind: 'milestone', action: 'create', name: milestone.title });
          this.pendingMilestones.add(milestone.title);
        } else {
          await this.mutate(`creating milestone "${milestone.title}"`, () =>
            this.destination.createMilestone(options)
          );
        }

        created.add(milestone.title);
        counts.created++;
        this.reporter.created('milestone', milestone.title, this.isDryRun());
      }
    }

    return counts;
  }

  private async migrateLabels(): Promise<PhaseCounts> {
    const existing = await this.destination.listAllLabels();
    const created = new Set<string>();
    const counts = emptyCounts();

    for await (const page of this.source.listLabels()) {
      this.reporter.debug(`Source labels page ${page.number}: ${page.items.length} item(s)`);

      for (const label of page.items) {
        if (existing.has(label.name) || created.has(label.name)) {
          counts.skipped++;
          this.reporter.skipped('label', label.name);
          continue;
        }

        const options = {
          name: label.name,
          description: label.description,
          color: label.color,
        };

        if (this.isDryRun()) {
          this.plan.push({ kind: 'label', action: 'create', name: label.name });
          this.pendingLabels.add(label.name);
        } else {
          await this.mutate(`creating label "${label.name}"`, () => this.destination.createLabel(options));
        }

        created.add(label.name);
        counts.created++;
        this.reporter.created('label', label.name, this.isDryRun());
      }
    }

    return counts;
  }

  private async migrateIssues(): Promise<PhaseCounts> {
    const tables: IssueTables = {
      issues: await this.destination.listAllIssues(),
      milestones: await this.destination.listAllMilestones(),
      labels: await this.destination.listAllLabels(),
    };
    const counts = emptyCounts();

    for await (const page of this.source.listOpenIssues()) {
      this.reporter.debug(`Source issues page ${page.number}: ${page.items.length} item(s)`);

      for (const issue of page.items) {
        await this.migrateIssue(issue, tables, counts);
      }
    }

    return counts;
  }

  private async migrateIssue(issue: Issue, tables: IssueTables, counts: PhaseCounts): Promise<void> {
    const { milestoneId, labelIds, milestone, labels, warnings } = resolveReferences(
      issue,
      tables.milestones,
      tables.labels,
      { milestones: this.pendingMilestones, labels: this.pendingLabels }
    );
    for (const warning of warnings) {
      this.reporter.referenceWarning(issue.title, warning);
    }
    counts.warnings += warnings.length;

    const payload: IssuePayload = {
      title: issue.title,
      body: this.issueBody(issue),
      dueDate: issue.dueDate,
      milestoneId,
      labelIds,
    };
    const target: PlannedIssueState = { body: payload.body, dueDate: issue.dueDate, milestone, labels };

    // The table is a snapshot: issues created earlier in this phase are not in it
    const existing = tables.issues.get(issue.title);

    if (!existing) {
      if (this.isDryRun()) {
        this.plan.push({ kind: 'issue', action: 'create', name: issue.title, target });
      } else {
        await this.mutate(`creating issue "${issue.title}"`, () => this.destination.createIssue(payload));
      }

      counts.created++;
      this.reporter.created('issue', issue.title, this.isDryRun());
      return;
    }

    if (this.isDryRun()) {
      this.plan.push({
        kind: 'issue',
        action: 'update',
        name: issue.title,
        index: existing.index,
        current: {
          body: existing.body,
          dueDate: existing.dueDate,
          milestone: existing.milestone,
          labels: existing.labels,
        },
        target,
      });
    } else {
      await this.mutate(`editing issue #${existing.index} "${issue.title}"`, () =>
        this.destination.editIssue(existing.index, {
          title: payload.title,
          body: payload.body,
          dueDate: payload.dueDate,
          milestoneId: payload.milestoneId,
        })
      );
      await this.replaceLabels(existing.index, issue.title, labelIds);
    }

    counts.updated++;
    this.reporter.updated('issue', issue.title, this.isDryRun());
  }

  /**
   * Second half of an update. A failure here leaves the issue with new
   * fields and old labels; that state is always reported.
   */
  private async replaceLabels(index: number, title: string, labelIds: number[]): Promise<void> {
    const context = `replacing labels of issue #${index} "${title}"`;

    try {
      await this.destination.replaceIssueLabels(index, labelIds);
      return;
    } catch (error) {
      this.reporter.partialUpdate(title, index, describeError(error));
      if (!this.options.retryLabelReplace) {
        throw wrapError(context, error);
      }
    }

    this.reporter.debug(`Retrying label replacement for issue #${index}`);
    await this.mutate(`${context} (retry)`, () => this.destination.replaceIssueLabels(index, labelIds));
  }

  private issueBody(issue: Issue): string {
    if (!this.options.sourceReference) {
      return issue.body;
    }

    const footer = `_Migrated from ${this.options.sourceReference}#${issue.index}_`;
    return issue.body ? `${issue.body}\n\n---\n\n${footer}` : footer;
  }

  private async mutate<T>(context: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw wrapError(context, error);
    }
  }

  private isDryRun(): boolean {
    return this.options.dryRun ?? false;
  }
}

function emptyCounts(): PhaseCounts {
  return { created: 0, updated: 0, skipped: 0, warnings: 0 };
}
