/**
 * Configuration from CLI options and environment variables
 */

import { ConfigError } from './errors';
import { DEFAULT_GITLAB_SERVER } from './gitlab-client';

export interface CliOptions {
  gitlabToken?: string;
  gitlabServer?: string;
  gitlabProject?: string;
  giteaToken?: string;
  giteaServer?: string;
  giteaProject?: string;
  tagSource?: boolean;
  retryLabels?: boolean;
  verbose?: boolean;
}

export interface ProjectPath {
  owner: string; // namespace for GitLab, may contain "/"
  name: string;
}

export interface MigrationConfig {
  gitlab: {
    token: string;
    serverUrl: string;
    project: string;
  };
  gitea: {
    token: string;
    serverUrl: string;
    owner: string;
    repo: string;
  };
  tagSource: boolean;
  retryLabels: boolean;
  verbose: boolean;
}

/**
 * Split "namespace/name"; GitLab allows nested groups, Gitea exactly owner/name
 */
export function parseProjectPath(value: string, allowNested: boolean): ProjectPath | null {
  const parts = value.split('/');
  if (parts.length < 2 || parts.some((p) => p.trim() === '')) {
    return null;
  }
  if (!allowNested && parts.length !== 2) {
    return null;
  }

  const name = parts[parts.length - 1];
  return { owner: parts.slice(0, -1).join('/'), name };
}

/**
 * Merge CLI options over environment variables, apply defaults and validate.
 * Every problem is collected before throwing.
 */
export function resolveConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): MigrationConfig {
  const problems: string[] = [];

  const gitlabToken = options.gitlabToken || env.GITLAB_TOKEN || '';
  const gitlabServer = options.gitlabServer || env.GITLAB_SERVER || DEFAULT_GITLAB_SERVER;
  const gitlabProject = options.gitlabProject || env.GITLAB_PROJECT || '';
  const giteaToken = options.giteaToken || env.GITEA_TOKEN || '';
  const giteaServer = options.giteaServer || env.GITEA_SERVER || '';
  const giteaProject = options.giteaProject || env.GITEA_PROJECT || gitlabProject;

  if (!gitlabToken) {
    problems.push('GitLab token is required (--gitlab-token or GITLAB_TOKEN)');
  }
  if (!gitlabProject) {
    problems.push('GitLab project is required (--gitlab-project or GITLAB_PROJECT)');
  } else if (!parseProjectPath(gitlabProject, true)) {
    problems.push(`Invalid GitLab project "${gitlabProject}". Expected "namespace/name"`);
  }
  if (!giteaToken) {
    problems.push('Gitea token is required (--gitea-token or GITEA_TOKEN)');
  }
  if (!giteaServer) {
    problems.push('Gitea server URL is required (--gitea-server or GITEA_SERVER)');
  }

  if (!isHttpUrl(gitlabServer)) {
    problems.push(`Invalid GitLab server URL "${gitlabServer}"`);
  }
  if (giteaServer && !isHttpUrl(giteaServer)) {
    problems.push(`Invalid Gitea server URL "${giteaServer}"`);
  }

  const giteaPath = giteaProject ? parseProjectPath(giteaProject, false) : null;
  if (giteaProject && !giteaPath) {
    problems.push(`Invalid Gitea project "${giteaProject}". Expected "owner/name"`);
  }

  if (problems.length > 0 || !giteaPath) {
    throw new ConfigError(problems);
  }

  return {
    gitlab: {
      token: gitlabToken,
      serverUrl: gitlabServer,
      project: gitlabProject,
    },
    gitea: {
      token: giteaToken,
      serverUrl: giteaServer,
      owner: giteaPath.owner,
      repo: giteaPath.name,
    },
    tagSource: options.tagSource ?? false,
    retryLabels: options.retryLabels ?? false,
    verbose: options.verbose ?? isTruthy(env.MIGRATE_VERBOSE),
  };
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function isTruthy(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}
