/**
 * Gitea Migrate - Programmatic API
 *
 * Export all classes and types for programmatic usage
 */

export { GitLabClient, DEFAULT_GITLAB_SERVER } from './lib/gitlab-client';
export { GiteaClient, DEFAULT_GITEA_PAGE_SIZE } from './lib/gitea-client';
export { MigrationEngine } from './lib/migration-engine';
export type { MigrationOptions } from './lib/migration-engine';
export { resolveReferences } from './lib/reference-resolver';
export type { PendingReferences, ReferenceWarning, ResolvedReferences } from './lib/reference-resolver';
export { ConsoleReporter, printMigrationResult } from './lib/reporter';
export type { MigrationReporter } from './lib/reporter';
export { paginate, drain, buildLookupTable, DEFAULT_PAGE_SIZE } from './lib/pagination';
export { resolveConfig, parseProjectPath } from './lib/config';
export { connectClients } from './lib/setup';
export { renderPlan, renderBodyDiff, renderIssueChanges, hasChanges } from './lib/change-preview';
export { ConfigError, SetupError, MigrationError, describeError } from './lib/errors';

export * from './lib/types';
