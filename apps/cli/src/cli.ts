import type { JiraGateway } from '@relscope/jira-client';
import type { LoggerMethods, LogLevel } from '@relscope/logger';

import type { CliArgs } from './cli-args';
import type { CliEnvironment, EnvironmentSource } from './config/environment';
import type { CommandContext } from './commands';

import { JiraClient } from '@relscope/jira-client';
import { getLogger } from '@relscope/logger';

import { parseCliArgs } from './cli-args';
import {
  GetStateCommand,
  LookupCommand,
  UpsertCommand,
  ValidatePrereqsCommand,
} from './commands';
import {
  loadActionsEnvironment,
  loadEnvironment,
  loadLogLevel,
} from './config/environment';
import { CommandError } from './errors';
import { ActionsReporter } from './reporting';

/**
 * Overridable collaborators of runCli
 */
export interface CliDependencies {
  /**
   * Build the Jira gateway (default: JiraClient)
   */
  createGateway?: (
    config: CliEnvironment,
    logger: LoggerMethods,
  ) => JiraGateway;

  /**
   * Destination for summaries and workflow commands (default: stdout)
   */
  write?: (text: string) => void;

  /**
   * Destination for log messages (default: stderr)
   */
  logSink?: LoggerMethods;
}

const stderrSink: LoggerMethods = {
  debug: (...args) => console.error(...args),
  info: (...args) => console.error(...args),
  warn: (...args) => console.error(...args),
  error: (...args) => console.error(...args),
};

export function createJiraGateway(
  config: CliEnvironment,
  logger: LoggerMethods,
): JiraGateway {
  return new JiraClient({
    baseUrl: config.jiraBaseUrl,
    email: config.jiraEmail,
    apiToken: config.jiraApiToken,
    logger,
    skipUpdate: config.skipUpdate,
  });
}

/**
 * Log level for this run; an invalid setting is reported once the
 * logger exists
 */
function resolveLogLevel(env: EnvironmentSource): {
  level: LogLevel;
  error?: unknown;
} {
  try {
    return { level: loadLogLevel(env) };
  } catch (error) {
    return { level: 'info', error };
  }
}

export async function runCommand(
  args: CliArgs,
  context: CommandContext,
): Promise<void> {
  switch (args.command) {
    case 'upsert':
      return new UpsertCommand(context).run(args);
    case 'lookup':
      return new LookupCommand(context).run(args);
    case 'get-state':
      return new GetStateCommand(context).run(args);
    case 'validate-upsert-prereqs':
      return new ValidatePrereqsCommand(context).run(args);
  }
}

/**
 * Run one command and report its outcome
 *
 * Every failure is written as an annotation, the `error_message` output and
 * a summary line.
 *
 * @returns The process exit code
 */
export async function runCli(
  argv: string[],
  env: EnvironmentSource,
  dependencies: CliDependencies = {},
): Promise<number> {
  const logLevel = resolveLogLevel(env);
  const logger = getLogger({
    level: logLevel.level,
    sink: dependencies.logSink ?? stderrSink,
  });
  const reporter = new ActionsReporter({
    ...loadActionsEnvironment(env),
    logger,
    write: dependencies.write,
  });

  try {
    if (logLevel.error !== undefined) {
      throw logLevel.error;
    }
    const args = parseCliArgs(argv);
    const config = loadEnvironment(env);
    const createGateway = dependencies.createGateway ?? createJiraGateway;

    logger.debug(`[Cli] Running ${args.command}`);
    await runCommand(args, {
      gateway: createGateway(config, logger),
      reporter,
      logger,
    });
    return 0;
  } catch (error) {
    const message = CommandError.getErrorMessage(error);
    logger.error(`[Cli] ${message}`);
    reporter.reportFailure(message);
    return 1;
  }
}
