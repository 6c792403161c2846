/**
 * GitLab REST API (v4) client - read-only source of a migration
 */

import { AxiosInstance } from 'axios';
import { apiBaseUrl, createHttpClient, parseApiDate } from './http';
import { DEFAULT_PAGE_SIZE, paginate } from './pagination';
import { Issue, Label, Milestone, Page, RemoteUser, SourceReader } from './types';

export const DEFAULT_GITLAB_SERVER = 'https://gitlab.com/';

interface GitLabUserResponse {
  id: number;
  username: string;
}

interface GitLabProjectResponse {
  id: number;
  path_with_namespace: string;
}

interface GitLabMilestoneResponse {
  id: number;
  iid: number;
  title: string;
  description: string | null;
  due_date: string | null;
  state: 'active' | 'closed';
}

interface GitLabLabelResponse {
  id: number;
  name: string;
  color: string;
  description: string | null;
}

interface GitLabIssueResponse {
  id: number;
  iid: number;
  title: string;
  description: string | null;
  due_date: string | null;
  state: 'opened' | 'closed';
  labels: string[];
  milestone: { id: number; title: string } | null;
}

export interface GitLabClientOptions {
  token: string;
  serverUrl?: string;
  projectPath: string; // namespace/name, nested groups allowed
  pageSize?: number;
}

export class GitLabClient implements SourceReader {
  private http: AxiosInstance;
  private projectPath: string;
  private pageSize: number;
  private projectId: number | null = null;

  constructor(options: GitLabClientOptions) {
    this.http = createHttpClient(
      apiBaseUrl(options.serverUrl || DEFAULT_GITLAB_SERVER, '/api/v4'),
      `Bearer ${options.token}`,
      'gitea-migrate'
    );
    this.projectPath = options.projectPath;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  /**
   * Authenticated user; doubles as the connectivity and token check
   */
  async currentUser(): Promise<RemoteUser> {
    const { data } = await this.http.get<GitLabUserResponse>('/user');
    return { id: data.id, username: data.username };
  }

  /**
   * Look up the project by path and remember its numeric ID
   */
  async resolveProject(): Promise<number> {
    const { data } = await this.http.get<GitLabProjectResponse>(
      `/projects/${encodeURIComponent(this.projectPath)}`
    );
    this.projectId = data.id;
    return data.id;
  }

  listOpenMilestones(): AsyncIterable<Page<Milestone>> {
    return paginate(async (page, perPage) => {
      const { data } = await this.http.get<GitLabMilestoneResponse[]>(`${this.projectUrl()}/milestones`, {
        params: { state: 'active', page, per_page: perPage },
      });
      return data.map(toMilestone);
    }, { perPage: this.pageSize });
  }

  listLabels(): AsyncIterable<Page<Label>> {
    return paginate(async (page, perPage) => {
      const { data } = await this.http.get<GitLabLabelResponse[]>(`${this.projectUrl()}/labels`, {
        params: { page, per_page: perPage },
      });
      return data.map(toLabel);
    }, { perPage: this.pageSize });
  }

  listOpenIssues(): AsyncIterable<Page<Issue>> {
    return paginate(async (page, perPage) => {
      const { data } = await this.http.get<GitLabIssueResponse[]>(`${this.projectUrl()}/issues`, {
        params: { state: 'opened', page, per_page: perPage },
      });
      return data.map(toIssue);
    }, { perPage: this.pageSize });
  }

  private projectUrl(): string {
    if (this.projectId === null) {
      throw new Error(`GitLab project ${this.projectPath} has not been resolved`);
    }
    return `/projects/${this.projectId}`;
  }
}

function toMilestone(data: GitLabMilestoneResponse): Milestone {
  return {
    id: data.id,
    title: data.title,
    description: data.description || '',
    dueDate: parseApiDate(data.due_date),
    state: data.state,
  };
}

function toLabel(data: GitLabLabelResponse): Label {
  return {
    id: data.id,
    name: data.name,
    description: data.description || '',
    color: data.color,
  };
}

function toIssue(data: GitLabIssueResponse): Issue {
  return {
    index: data.iid,
    title: data.title,
    body: data.description || '',
    dueDate: parseApiDate(data.due_date),
    milestone: data.milestone?.title ?? null,
    labels: data.labels,
    state: data.state === 'opened' ? 'open' : 'closed',
  };
}
