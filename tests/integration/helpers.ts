/**
 * In-memory GitLab and Gitea stand-ins for engine tests
 */

import { MigrationReporter } from '../../src/lib/reporter';
import { buildLookupTable, paginate } from '../../src/lib/pagination';
import {
  CreateLabelOptions,
  CreateMilestoneOptions,
  Destination,
  EditIssueOptions,
  Issue,
  IssuePayload,
  Label,
  LookupTable,
  Milestone,
  Page,
  SourceReader,
} from '../../src/lib/types';

export function makeMilestone(id: number, title: string, overrides: Partial<Milestone> = {}): Milestone {
  return { id, title, description: '', dueDate: null, state: 'active', ...overrides };
}

export function makeLabel(id: number, name: string, overrides: Partial<Label> = {}): Label {
  return { id, name, description: '', color: '#428bca', ...overrides };
}

export function makeIssue(index: number, title: string, overrides: Partial<Issue> = {}): Issue {
  return { index, title, body: '', dueDate: null, milestone: null, labels: [], state: 'open', ...overrides };
}

interface ProjectData {
  milestones?: Milestone[];
  labels?: Label[];
  issues?: Issue[];
}

function pageOf<T>(items: T[], page: number, perPage: number): T[] {
  return items.slice((page - 1) * perPage, page * perPage);
}

/**
 * Source project; applies the same state filters the GitLab queries do
 */
export class FakeGitLab implements SourceReader {
  milestones: Milestone[];
  labels: Label[];
  issues: Issue[];
  pageRequests = { milestones: 0, labels: 0, issues: 0 };
  private pageSize: number;

  constructor(data: ProjectData = {}, pageSize = 100) {
    this.milestones = data.milestones ?? [];
    this.labels = data.labels ?? [];
    this.issues = data.issues ?? [];
    this.pageSize = pageSize;
  }

  listOpenMilestones(): AsyncIterable<Page<Milestone>> {
    return paginate(async (page, perPage) => {
      this.pageRequests.milestones++;
      return pageOf(this.milestones.filter((m) => m.state === 'active'), page, perPage);
    }, { perPage: this.pageSize });
  }

  listLabels(): AsyncIterable<Page<Label>> {
    return paginate(async (page, perPage) => {
      this.pageRequests.labels++;
      return pageOf(this.labels, page, perPage);
    }, { perPage: this.pageSize });
  }

  listOpenIssues(): AsyncIterable<Page<Issue>> {
    return paginate(async (page, perPage) => {
      this.pageRequests.issues++;
      return pageOf(this.issues.filter((i) => i.state === 'open'), page, perPage);
    }, { perPage: this.pageSize });
  }
}

/**
 * Destination repository that records every call
 */
export class FakeGitea implements Destination {
  milestones: Milestone[];
  labels: Label[];
  issues: Issue[];
  private nextId = 500;

  constructor(data: ProjectData = {}) {
    this.milestones = data.milestones ?? [];
    this.labels = data.labels ?? [];
    this.issues = data.issues ?? [];
  }

  listAllMilestones = jest.fn(async (): Promise<LookupTable<Milestone>> =>
    buildLookupTable(this.milestones, (m) => m.title)
  );

  listAllLabels = jest.fn(async (): Promise<LookupTable<Label>> => buildLookupTable(this.labels, (l) => l.name));

  listAllIssues = jest.fn(async (): Promise<LookupTable<Issue>> => buildLookupTable(this.issues, (i) => i.title));

  createMilestone = jest.fn(async (options: CreateMilestoneOptions): Promise<Milestone> => {
    const milestone = makeMilestone(this.nextId++, options.title, {
      description: options.description,
      dueDate: options.dueDate,
    });
    this.milestones.push(milestone);
    return milestone;
  });

  createLabel = jest.fn(async (options: CreateLabelOptions): Promise<Label> => {
    const label = makeLabel(this.nextId++, options.name, {
      description: options.description,
      color: options.color,
    });
    this.labels.push(label);
    return label;
  });

  createIssue = jest.fn(async (payload: IssuePayload): Promise<Issue> => {
    const index = Math.max(0, ...this.issues.map((i) => i.index)) + 1;
    const issue = makeIssue(index, payload.title, {
      body: payload.body,
      dueDate: payload.dueDate,
      milestone: this.milestoneTitle(payload.milestoneId),
      labels: this.labelNames(payload.labelIds),
    });
    this.issues.push(issue);
    return issue;
  });

  editIssue = jest.fn(async (index: number, options: EditIssueOptions): Promise<Issue> => {
    const issue = this.findIssue(index);
    issue.title = options.title;
    issue.body = options.body;
    issue.dueDate = options.dueDate;
    issue.milestone = this.milestoneTitle(options.milestoneId);
    return issue;
  });

  replaceIssueLabels = jest.fn(async (index: number, labelIds: number[]): Promise<Label[]> => {
    const issue = this.findIssue(index);
    issue.labels = this.labelNames(labelIds);
    return this.labels.filter((l) => labelIds.includes(l.id));
  });

  private findIssue(index: number): Issue {
    const issue = this.issues.find((i) => i.index === index);
    if (!issue) {
      throw new Error(`404 Not Found: issue #${index}`);
    }
    return issue;
  }

  private milestoneTitle(id: number | null): string | null {
    return this.milestones.find((m) => m.id === id)?.title ?? null;
  }

  private labelNames(ids: number[]): string[] {
    return ids.map((id) => this.labels.find((l) => l.id === id)?.name ?? `#${id}`);
  }
}

export function makeReporter(): jest.Mocked<MigrationReporter> {
  return {
    phaseStarted: jest.fn(),
    phaseFinished: jest.fn(),
    created: jest.fn(),
    updated: jest.fn(),
    skipped: jest.fn(),
    referenceWarning: jest.fn(),
    partialUpdate: jest.fn(),
    debug: jest.fn(),
  };
}
