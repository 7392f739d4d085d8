import type { LogLevel } from '@relscope/logger';

import { isLogLevel } from '@relscope/logger';
import { z } from 'zod';

import { CommandError } from '../errors';
import { FALSY_FLAG_VALUES, REQUIRED_CREDENTIALS } from './constants';

export type EnvironmentSource = Record<string, string | undefined>;

/**
 * Jira connection and runtime settings read from the environment
 */
export interface CliEnvironment {
  jiraBaseUrl: string;
  jiraEmail: string;
  jiraApiToken: string;
  /** Prepare description updates without sending them */
  skipUpdate: boolean;
}

/**
 * GitHub Actions file commands; both are absent outside a workflow run
 */
export interface ActionsEnvironment {
  outputPath?: string;
  summaryPath?: string;
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const EnvironmentSchema = z.object({
  JIRA_BASE_URL: z.string().trim().url('JIRA_BASE_URL must be a URL'),
  JIRA_EMAIL: z.string().trim().min(1),
  JIRA_API_TOKEN: z.string().trim().min(1),
  RELSCOPE_SKIP_UPDATE: optionalText.transform(
    (value) =>
      value !== undefined &&
      !FALSY_FLAG_VALUES.some((falsy) => falsy === value.toLowerCase()),
  ),
});

const LogLevelSchema = optionalText.pipe(
  z
    .custom<LogLevel>(
      (value) => typeof value === 'string' && isLogLevel(value),
      'RELSCOPE_LOG_LEVEL must be one of debug, info, warn, error',
    )
    .default('info'),
);

/**
 * Read Jira credentials and runtime flags
 *
 * @throws {CommandError} When a credential is missing or a value is invalid
 */
export function loadEnvironment(env: EnvironmentSource): CliEnvironment {
  const missing = REQUIRED_CREDENTIALS.filter((name) => !env[name]?.trim());
  if (missing.length > 0) {
    throw new CommandError(
      `Missing JIRA credentials in environment: ${missing.join(', ')}.\nProvide these as repository or organization secrets and pass them to the workflow.`,
    );
  }

  const result = EnvironmentSchema.safeParse(env);
  if (!result.success) {
    throw new CommandError(
      `Invalid environment: ${result.error.issues.map((issue) => issue.message).join('; ')}`,
      { cause: result.error },
    );
  }

  const config = result.data;
  return {
    jiraBaseUrl: config.JIRA_BASE_URL,
    jiraEmail: config.JIRA_EMAIL,
    jiraApiToken: config.JIRA_API_TOKEN,
    skipUpdate: config.RELSCOPE_SKIP_UPDATE,
  };
}

/**
 * Read RELSCOPE_LOG_LEVEL (default: 'info')
 *
 * @throws {CommandError} When the value names no log level
 */
export function loadLogLevel(env: EnvironmentSource): LogLevel {
  const result = LogLevelSchema.safeParse(env.RELSCOPE_LOG_LEVEL);
  if (!result.success) {
    throw new CommandError(
      `Invalid environment: ${result.error.issues.map((issue) => issue.message).join('; ')}`,
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * Read the GitHub Actions output and summary file paths
 */
export function loadActionsEnvironment(
  env: EnvironmentSource,
): ActionsEnvironment {
  return {
    outputPath: env.GITHUB_OUTPUT?.trim() || undefined,
    summaryPath: env.GITHUB_STEP_SUMMARY?.trim() || undefined,
  };
}
