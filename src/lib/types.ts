/**
 * Shared types for the migration system
 */

export type MilestoneState = 'active' | 'closed';

export type IssueState = 'open' | 'closed';

export interface Milestone {
  id: number;
  title: string;
  description: string;
  dueDate: Date | null;
  state: MilestoneState;
}

export interface Label {
  id: number;
  name: string;
  description: string;
  color: string;
}

export interface Issue {
  index: number; // GitLab iid or Gitea issue number
  title: string;
  body: string;
  dueDate: Date | null;
  milestone: string | null; // milestone title
  labels: string[]; // label names
  state: IssueState;
}

export interface RemoteUser {
  id: number;
  username: string;
}

/** Destination entities keyed by title or name */
export type LookupTable<T> = Map<string, T>;

export interface Page<T> {
  number: number;
  items: T[];
}

export interface CreateMilestoneOptions {
  title: string;
  description: string;
  dueDate: Date | null;
}

export interface CreateLabelOptions {
  name: string;
  description: string;
  color: string;
}

export interface IssuePayload {
  title: string;
  body: string;
  dueDate: Date | null;
  milestoneId: number | null;
  labelIds: number[];
}

export type EditIssueOptions = Omit<IssuePayload, 'labelIds'>;

/**
 * Read access to the project being migrated from
 */
export interface SourceReader {
  listOpenMilestones(): AsyncIterable<Page<Milestone>>;
  listLabels(): AsyncIterable<Page<Label>>;
  listOpenIssues(): AsyncIterable<Page<Issue>>;
}

/**
 * Fully drained listings of the project being migrated to
 */
export interface DestinationReader {
  listAllMilestones(): Promise<LookupTable<Milestone>>;
  listAllLabels(): Promise<LookupTable<Label>>;
  listAllIssues(): Promise<LookupTable<Issue>>;
}

export interface DestinationWriter {
  createMilestone(options: CreateMilestoneOptions): Promise<Milestone>;
  createLabel(options: CreateLabelOptions): Promise<Label>;
  createIssue(payload: IssuePayload): Promise<Issue>;
  editIssue(index: number, options: EditIssueOptions): Promise<Issue>;
  replaceIssueLabels(index: number, labelIds: number[]): Promise<Label[]>;
}

export type Destination = DestinationReader & DestinationWriter;

export type MigrationPhase = 'milestones' | 'labels' | 'issues';

export type MigrationState = 'init' | MigrationPhase | 'done' | 'failed';

export type EntityKind = 'milestone' | 'label' | 'issue';

export interface PhaseCounts {
  created: number;
  updated: number;
  skipped: number;
  warnings: number;
}

/**
 * Issue fields as they read on the destination, references by name
 */
export interface PlannedIssueState {
  body: string;
  dueDate: Date | null;
  milestone: string | null;
  labels: string[];
}

export interface PlannedChange {
  kind: EntityKind;
  action: 'create' | 'update';
  name: string;
  index?: number; // destination issue number for updates
  current?: PlannedIssueState; // destination issue before an update
  target?: PlannedIssueState; // what a real run would write
}

export interface MigrationResult {
  dryRun: boolean;
  milestones: PhaseCounts;
  labels: PhaseCounts;
  issues: PhaseCounts;
  plan: PlannedChange[];
}
