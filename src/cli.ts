#!/usr/bin/env node

/**
 * Gitea Migrate CLI
 *
 * Migrates milestones, labels and open issues from a GitLab project to a Gitea repository
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import path from 'path';
import inquirer from 'inquirer';
import { config } from 'dotenv';
import { CliOptions, MigrationConfig, resolveConfig } from './lib/config';
import { ConnectedClients, connectClients } from './lib/setup';
import { MigrationEngine } from './lib/migration-engine';
import { ConsoleReporter, printMigrationResult } from './lib/reporter';
import { renderPlan } from './lib/change-preview';
import { describeError } from './lib/errors';

// Load environment variables from the directory the command runs in
config({ path: path.join(process.cwd(), '.env.local') });
config({ path: path.join(process.cwd(), '.env') });

interface MigrateOptions extends CliOptions {
  yes?: boolean;
}

/**
 * Print an error and exit non-zero
 */
function fail(message: string): never {
  console.error(chalk.red(`\nError: ${message}`));
  process.exit(1);
}

function loadConfig(options: CliOptions): MigrationConfig {
  try {
    return resolveConfig(options);
  } catch (error) {
    return fail(describeError(error));
  }
}

/**
 * Connect to both servers under a spinner, one step at a time
 */
async function connect(migrationConfig: MigrationConfig): Promise<ConnectedClients> {
  const spinner = ora();

  try {
    return await connectClients(migrationConfig, {
      stepStarted: (step) => {
        spinner.start(`${step.charAt(0).toUpperCase()}${step.slice(1)}...`);
      },
      stepSucceeded: (_step, detail) => {
        spinner.succeed(detail);
      },
      stepFailed: (step) => {
        spinner.fail(`Failed ${step}`);
      },
    });
  } catch (error) {
    return fail(describeError(error));
  }
}

async function confirmMigration(migrationConfig: MigrationConfig): Promise<boolean> {
  if (!process.stdin.isTTY) {
    return true;
  }

  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: 'confirm',
      name: 'proceed',
      message:
        `Migrate milestones, labels and open issues from ${migrationConfig.gitlab.project} ` +
        `to ${migrationConfig.gitea.owner}/${migrationConfig.gitea.repo}?`,
      default: true,
    },
  ]);
  return proceed;
}

function addConnectionOptions(command: Command): Command {
  return command
    .option('--gitlab-token <token>', 'Token for GitLab API access (env: GITLAB_TOKEN)')
    .option('--gitlab-server <url>', 'GitLab server URL (env: GITLAB_SERVER, default: https://gitlab.com/)')
    .option('--gitlab-project <path>', 'GitLab project, use namespace/name (env: GITLAB_PROJECT)')
    .option('--gitea-token <token>', 'Token for Gitea API access (env: GITEA_TOKEN)')
    .option('--gitea-server <url>', 'Gitea server URL (env: GITEA_SERVER)')
    .option('--gitea-project <path>', 'Gitea repository, use owner/name; defaults to the GitLab project (env: GITEA_PROJECT)')
    .option('--tag-source', 'Append a "Migrated from" reference to each issue body')
    .option('--verbose', 'Report page fetches and skipped items (env: MIGRATE_VERBOSE)');
}

// Create CLI
const program = new Command();

program
  .name('gitea-migrate')
  .description('Migrate milestones, labels and open issues from GitLab to Gitea')
  .version('1.0.0');

// Migrate command (default)
addConnectionOptions(program.command('migrate', { isDefault: true }))
  .description('Create missing milestones and labels, then create or update open issues')
  .option('--retry-labels', 'Retry a failed issue label replacement once')
  .option('-y, --yes', 'Do not ask for confirmation')
  .action(async (options: MigrateOptions) => {
    const migrationConfig = loadConfig(options);
    const clients = await connect(migrationConfig);

    if (!options.yes && !(await confirmMigration(migrationConfig))) {
      console.log(chalk.gray('Migration cancelled'));
      return;
    }

    const reporter = new ConsoleReporter({ verbose: migrationConfig.verbose });
    const engine = new MigrationEngine(clients.gitlab, clients.gitea, reporter, {
      sourceReference: migrationConfig.tagSource ? migrationConfig.gitlab.project : null,
      retryLabelReplace: migrationConfig.retryLabels,
    });

    try {
      const result = await engine.migrate();
      printMigrationResult(result);
      console.log(chalk.green('Migration finished successfully'));
    } catch (error) {
      fail(describeError(error));
    }
  });

// Plan command
addConnectionOptions(program.command('plan'))
  .description('Show what a migration would change without changing anything')
  .action(async (options: CliOptions) => {
    const migrationConfig = loadConfig(options);
    const clients = await connect(migrationConfig);

    const reporter = new ConsoleReporter({ verbose: migrationConfig.verbose });
    const engine = new MigrationEngine(clients.gitlab, clients.gitea, reporter, {
      dryRun: true,
      sourceReference: migrationConfig.tagSource ? migrationConfig.gitlab.project : null,
    });

    try {
      const result = await engine.migrate();
      printMigrationResult(result);
      for (const line of renderPlan(result.plan)) {
        console.log(line);
      }
      console.log();
    } catch (error) {
      fail(describeError(error));
    }
  });

// Parse and execute
program.parseAsync().catch((error: unknown) => fail(describeError(error)));
