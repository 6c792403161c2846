/**
 * Gitea REST API (v1) client - lookup tables and mutations on the migration destination
 */

import { AxiosInstance } from 'axios';
import { apiBaseUrl, createHttpClient, parseApiDate } from './http';
import { buildLookupTable, drain, paginate } from './pagination';
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
  RemoteUser,
} from './types';

// Gitea's default MAX_RESPONSE_ITEMS; larger limits are silently capped
export const DEFAULT_GITEA_PAGE_SIZE = 50;

interface GiteaUserResponse {
  id: number;
  login: string;
}

interface GiteaRepositoryResponse {
  id: number;
  full_name: string;
}

interface GiteaMilestoneResponse {
  id: number;
  title: string;
  description: string | null;
  state: 'open' | 'closed';
  due_on: string | null;
}

interface GiteaLabelResponse {
  id: number;
  name: string;
  color: string;
  description: string | null;
}

interface GiteaIssueResponse {
  id: number;
  number: number;
  title: string;
  body: string | null;
  state: 'open' | 'closed';
  due_date: string | null;
  milestone: GiteaMilestoneResponse | null;
  labels: GiteaLabelResponse[] | null;
}

interface GiteaEditIssueRequest {
  title: string;
  body: string;
  milestone: number;
  due_date?: string;
  unset_due_date?: boolean;
}

export interface GiteaClientOptions {
  token: string;
  serverUrl: string;
  owner: string;
  repo: string;
  pageSize?: number;
}

export class GiteaClient implements Destination {
  private http: AxiosInstance;
  private owner: string;
  private repo: string;
  private pageSize: number;

  constructor(options: GiteaClientOptions) {
    this.http = createHttpClient(apiBaseUrl(options.serverUrl, '/api/v1'), `token ${options.token}`, 'gitea-migrate');
    this.owner = options.owner;
    this.repo = options.repo;
    this.pageSize = options.pageSize ?? DEFAULT_GITEA_PAGE_SIZE;
  }

  /**
   * Authenticated user; doubles as the connectivity and token check
   */
  async currentUser(): Promise<RemoteUser> {
    const { data } = await this.http.get<GiteaUserResponse>('/user');
    return { id: data.id, username: data.login };
  }

  /**
   * Numeric ID of the target repository (fails when it does not exist)
   */
  async resolveRepository(): Promise<number> {
    const { data } = await this.http.get<GiteaRepositoryResponse>(this.repoUrl());
    return data.id;
  }

  async listAllMilestones(): Promise<LookupTable<Milestone>> {
    const milestones = await drain(
      paginate(async (page, limit) => {
        const { data } = await this.http.get<GiteaMilestoneResponse[]>(`${this.repoUrl()}/milestones`, {
          params: { state: 'all', page, limit },
        });
        return data.map(toMilestone);
      }, { perPage: this.pageSize })
    );
    return buildLookupTable(milestones, (m) => m.title);
  }

  async listAllLabels(): Promise<LookupTable<Label>> {
    const labels = await drain(
      paginate(async (page, limit) => {
        const { data } = await this.http.get<GiteaLabelResponse[]>(`${this.repoUrl()}/labels`, {
          params: { page, limit },
        });
        return data.map(toLabel);
      }, { perPage: this.pageSize })
    );
    return buildLookupTable(labels, (l) => l.name);
  }

  /**
   * All issues in any state. Pull requests are left out of the listing, so a
   * source issue whose title matches a pull request is created as a new issue
   * instead of being written over the pull request.
   */
  async listAllIssues(): Promise<LookupTable<Issue>> {
    const issues = await drain(
      paginate(async (page, limit) => {
        const { data } = await this.http.get<GiteaIssueResponse[]>(`${this.repoUrl()}/issues`, {
          params: { state: 'all', type: 'issues', page, limit },
        });
        return data.map(toIssue);
      }, { perPage: this.pageSize })
    );
    return buildLookupTable(issues, (i) => i.title);
  }

  async createMilestone(options: CreateMilestoneOptions): Promise<Milestone> {
    const { data } = await this.http.post<GiteaMilestoneResponse>(`${this.repoUrl()}/milestones`, {
      title: options.title,
      description: options.description,
      due_on: options.dueDate?.toISOString(),
    });
    return toMilestone(data);
  }

  async createLabel(options: CreateLabelOptions): Promise<Label> {
    const { data } = await this.http.post<GiteaLabelResponse>(`${this.repoUrl()}/labels`, {
      name: options.name,
      description: options.description,
      color: options.color,
    });
    return toLabel(data);
  }

  async createIssue(payload: IssuePayload): Promise<Issue> {
    const { data } = await this.http.post<GiteaIssueResponse>(`${this.repoUrl()}/issues`, {
      title: payload.title,
      body: payload.body,
      due_date: payload.dueDate?.toISOString(),
      milestone: payload.milestoneId ?? undefined,
      labels: payload.labelIds,
    });
    return toIssue(data);
  }

  /**
   * Overwrite title, body, milestone and deadline; a missing milestone or
   * deadline clears the destination value
   */
  async editIssue(index: number, options: EditIssueOptions): Promise<Issue> {
    const request: GiteaEditIssueRequest = {
      title: options.title,
      body: options.body,
      milestone: options.milestoneId ?? 0,
    };
    if (options.dueDate) {
      request.due_date = options.dueDate.toISOString();
    } else {
      request.unset_due_date = true;
    }

    const { data } = await this.http.patch<GiteaIssueResponse>(`${this.repoUrl()}/issues/${index}`, request);
    return toIssue(data);
  }

  async replaceIssueLabels(index: number, labelIds: number[]): Promise<Label[]> {
    const { data } = await this.http.put<GiteaLabelResponse[]>(`${this.repoUrl()}/issues/${index}/labels`, {
      labels: labelIds,
    });
    return data.map(toLabel);
  }

  private repoUrl(): string {
    return `/repos/${encodeURIComponent(this.owner)}/${encodeURIComponent(this.repo)}`;
  }
}

function toMilestone(data: GiteaMilestoneResponse): Milestone {
  return {
    id: data.id,
    title: data.title,
    description: data.description || '',
    dueDate: parseApiDate(data.due_on),
    state: data.state === 'open' ? 'active' : 'closed',
  };
}

function toLabel(data: GiteaLabelResponse): Label {
  return {
    id: data.id,
    name: data.name,
    description: data.description || '',
    color: data.color,
  };
}

function toIssue(data: GiteaIssueResponse): Issue {
  return {
    index: data.number,
    title: data.title,
    body: data.body || '',
    dueDate: parseApiDate(data.due_date),
    milestone: data.milestone?.title ?? null,
    labels: (data.labels || []).map((l) => l.name),
    state: data.state,
  };
}
