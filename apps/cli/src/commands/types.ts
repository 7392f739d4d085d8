import type { JiraGateway } from '@relscope/jira-client';
import type { LoggerMethods } from '@relscope/logger';

import type { ActionsReporter } from '../reporting';

/**
 * Collaborators shared by every command
 */
export interface CommandContext {
  gateway: JiraGateway;
  reporter: ActionsReporter;
  logger: LoggerMethods;
}
