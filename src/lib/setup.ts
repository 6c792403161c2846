/**
 * Client construction and pre-flight checks
 */

import { SetupError } from './errors';
import { GiteaClient } from './gitea-client';
import { GitLabClient } from './gitlab-client';
import { MigrationConfig } from './config';

export interface ConnectedClients {
  gitlab: GitLabClient;
  gitea: GiteaClient;
  gitlabProjectId: number;
  giteaRepositoryId: number;
}

/**
 * Runs one named setup step; progress hooks let the CLI drive a spinner
 */
export interface SetupHooks {
  stepStarted?(step: string): void;
  stepSucceeded?(step: string, detail: string): void;
  stepFailed?(step: string): void;
}

export async function connectClients(config: MigrationConfig, hooks: SetupHooks = {}): Promise<ConnectedClients> {
  const gitlab = new GitLabClient({
    token: config.gitlab.token,
    serverUrl: config.gitlab.serverUrl,
    projectPath: config.gitlab.project,
  });
  const gitea = new GiteaClient({
    token: config.gitea.token,
    serverUrl: config.gitea.serverUrl,
    owner: config.gitea.owner,
    repo: config.gitea.repo,
  });

  const runStep = async <T>(step: string, call: () => Promise<T>, detail: (value: T) => string): Promise<T> => {
    hooks.stepStarted?.(step);
    try {
      const value = await call();
      hooks.stepSucceeded?.(step, detail(value));
      return value;
    } catch (error) {
      hooks.stepFailed?.(step);
      throw new SetupError(step, error);
    }
  };

  await runStep('getting GitLab user', () => gitlab.currentUser(), (u) => `GitLab user ${u.username}`);
  const gitlabProjectId = await runStep(
    'getting GitLab project',
    () => gitlab.resolveProject(),
    (id) => `GitLab project ${config.gitlab.project} (#${id})`
  );
  await runStep('getting Gitea user', () => gitea.currentUser(), (u) => `Gitea user ${u.username}`);
  const giteaRepositoryId = await runStep(
    'getting Gitea repository',
    () => gitea.resolveRepository(),
    (id) => `Gitea repository ${config.gitea.owner}/${config.gitea.repo} (#${id})`
  );

  return { gitlab, gitea, gitlabProjectId, giteaRepositoryId };
}
