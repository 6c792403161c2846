import { connectClients } from '../../src/lib/setup';
import { MigrationConfig } from '../../src/lib/config';
import { SetupError } from '../../src/lib/errors';
import { GitLabClient } from '../../src/lib/gitlab-client';
import { GiteaClient } from '../../src/lib/gitea-client';

jest.mock('../../src/lib/gitlab-client');
jest.mock('../../src/lib/gitea-client');

const config: MigrationConfig = {
  gitlab: { token: 'test-gitlab-token', serverUrl: 'https://gitlab.example.com/', project: 'group/widgets' },
  gitea: { token: 'test-gitea-token', serverUrl: 'https://gitea.example.com', owner: 'acme', repo: 'widgets' },
  tagSource: false,
  retryLabels: false,
  verbose: false,
};

describe('connectClients', () => {
  beforeEach(() => {
    jest.resetAllMocks();
    jest.mocked(GitLabClient.prototype.currentUser).mockResolvedValue({ id: 1, username: 'alice' });
    jest.mocked(GitLabClient.prototype.resolveProject).mockResolvedValue(77);
    jest.mocked(GiteaClient.prototype.currentUser).mockResolvedValue({ id: 2, username: 'bob' });
    jest.mocked(GiteaClient.prototype.resolveRepository).mockResolvedValue(31);
  });

  it('should construct both clients from the configuration', async () => {
    await connectClients(config);

    expect(GitLabClient).toHaveBeenCalledWith({
      token: 'test-gitlab-token',
      serverUrl: 'https://gitlab.example.com/',
      projectPath: 'group/widgets',
    });
    expect(GiteaClient).toHaveBeenCalledWith({
      token: 'test-gitea-token',
      serverUrl: 'https://gitea.example.com',
      owner: 'acme',
      repo: 'widgets',
    });
  });

  it('should run every step in order and return the resolved IDs', async () => {
    const events: string[] = [];

    const clients = await connectClients(config, {
      stepStarted: (step) => events.push(`start ${step}`),
      stepSucceeded: (_step, detail) => events.push(`ok ${detail}`),
    });

    expect(clients.gitlabProjectId).toBe(77);
    expect(clients.giteaRepositoryId).toBe(31);
    expect(events).toEqual([
      'start getting GitLab user',
      'ok GitLab user alice',
      'start getting GitLab project',
      'ok GitLab project group/widgets (#77)',
      'start getting Gitea user',
      'ok Gitea user bob',
      'start getting Gitea repository',
      'ok Gitea repository acme/widgets (#31)',
    ]);
  });

  it('should stop at the first failing step', async () => {
    jest.mocked(GiteaClient.prototype.currentUser).mockRejectedValue(new Error('401 Unauthorized'));
    const stepFailed = jest.fn();

    const error = await connectClients(config, { stepFailed }).then(
      () => null,
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(SetupError);
    expect(error).toHaveProperty('step', 'getting Gitea user');
    expect(error).toHaveProperty('message', 'getting Gitea user: 401 Unauthorized');
    expect(stepFailed).toHaveBeenCalledWith('getting Gitea user');
    expect(GiteaClient.prototype.resolveRepository).not.toHaveBeenCalled();
  });

  it('should report a missing GitLab project', async () => {
    jest.mocked(GitLabClient.prototype.resolveProject).mockRejectedValue(new Error('404 Project Not Found'));

    await expect(connectClients(config)).rejects.toThrow('getting GitLab project: 404 Project Not Found');
    expect(GiteaClient.prototype.currentUser).not.toHaveBeenCalled();
  });
});
