/**
 * Maps a source issue's milestone title and label names to destination IDs
 */

import { Issue, Label, LookupTable, Milestone } from './types';

export type ReferenceWarningKind = 'unknown-milestone' | 'unknown-label';

export interface ReferenceWarning {
  kind: ReferenceWarningKind;
  value: string;
}

/**
 * Names a dry run would have created by now; they have no ID yet
 */
export interface PendingReferences {
  milestones: ReadonlySet<string>;
  labels: ReadonlySet<string>;
}

export interface ResolvedReferences {
  milestoneId: number | null;
  labelIds: number[]; // source label order
  milestone: string | null; // resolved or pending title
  labels: string[]; // resolved or pending names, source order
  warnings: ReferenceWarning[];
}

const NO_PENDING: PendingReferences = { milestones: new Set(), labels: new Set() };

/**
 * Unresolved references are dropped and reported as warnings, never thrown
 */
export function resolveReferences(
  issue: Issue,
  milestones: LookupTable<Milestone>,
  labels: LookupTable<Label>,
  pending: PendingReferences = NO_PENDING
): ResolvedReferences {
  const warnings: ReferenceWarning[] = [];

  let milestoneId: number | null = null;
  let milestoneTitle: string | null = null;
  if (issue.milestone !== null) {
    const milestone = milestones.get(issue.milestone);
    if (milestone) {
      milestoneId = milestone.id;
      milestoneTitle = milestone.title;
    } else if (pending.milestones.has(issue.milestone)) {
      milestoneTitle = issue.milestone;
    } else {
      warnings.push({ kind: 'unknown-milestone', value: issue.milestone });
    }
  }

  const labelIds: number[] = [];
  const labelNames: string[] = [];
  for (const name of issue.labels) {
    const label = labels.get(name);
    if (label) {
      labelIds.push(label.id);
      labelNames.push(name);
    } else if (pending.labels.has(name)) {
      labelNames.push(name);
    } else {
      warnings.push({ kind: 'unknown-label', value: name });
    }
  }

  return { milestoneId, labelIds, milestone: milestoneTitle, labels: labelNames, warnings };
}
