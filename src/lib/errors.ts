/**
 * Error types for configuration, setup and migration failures
 */

import { isAxiosError } from 'axios';
import { MigrationPhase } from './types';

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

/**
 * Failure before any migration phase ran (auth, connectivity, lookups)
 */
export class SetupError extends Error {
  readonly step: string;

  constructor(step: string, cause: unknown) {
    super(`${step}: ${describeError(cause)}`, { cause });
    this.name = 'SetupError';
    this.step = step;
  }
}

export class MigrationError extends Error {
  readonly phase: MigrationPhase;

  constructor(phase: MigrationPhase, cause: unknown) {
    super(`migrating ${phase}: ${describeError(cause)}`, { cause });
    this.name = 'MigrationError';
    this.phase = phase;
  }
}

/**
 * Prefix an error with the operation that raised it
 */
export function wrapError(context: string, error: unknown): Error {
  return new Error(`${context}: ${describeError(error)}`, { cause: error });
}

/**
 * Readable one-line description of an HTTP or plain error
 */
export function describeError(error: unknown): string {
  if (isAxiosError(error)) {
    if (!error.response) {
      return error.message;
    }

    const { status, statusText } = error.response;
    const statusLine = statusText ? `${status} ${statusText}` : `${status}`;
    const message = serverMessage(error.response.data);
    return message ? `${statusLine}: ${message}` : statusLine;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Pull the message out of a GitLab or Gitea JSON error body
 */
function serverMessage(data: unknown): string | null {
  if (typeof data === 'string') {
    return data.trim() || null;
  }
  if (typeof data !== 'object' || data === null) {
    return null;
  }

  const value = 'message' in data ? data.message : 'error' in data ? data.error : undefined;
  if (typeof value === 'string') {
    return value;
  }
  if (value !== undefined && value !== null) {
    // GitLab validation errors: {"message": {"title": ["has already been taken"]}}
    return JSON.stringify(value);
  }

  return null;
}
