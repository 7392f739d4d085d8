import type { ValidateArgs } from '../cli-args';
import type { CommandContext } from './types';

import { UpsertPrerequisiteValidator } from '@relscope/jira-client';

import { CommandError } from '../errors';

/**
 * ValidatePrereqsCommand
 *
 * Runs the upsert prerequisite checks on their own, so a workflow can gate
 * later steps without changing the issue.
 */
export class ValidatePrereqsCommand {
  constructor(private readonly context: CommandContext) {}

  async run(args: ValidateArgs): Promise<void> {
    const { gateway, reporter, logger } = this.context;
    const validator = new UpsertPrerequisiteValidator(gateway, logger);
    const { valid, errors, details } = await validator.validate(args.jiraKey, {
      issueType: args.issueType,
      permissionFieldId: args.permissionFieldId,
      blockedStatuses: args.blockedStatuses,
    });

    reporter.setOutput('validation_passed', valid);
    reporter.setOutput('ticket_status', details.currentStatus);
    reporter.setOutput('ticket_key', args.jiraKey);

    const lines = [
      `### Validation Results: **${args.jiraKey}**`,
      `- **${valid ? 'Validation Passed' : 'Validation Failed'}**`,
    ];
    if (details.issueSummary) {
      lines.push(`- Summary: ${details.issueSummary}`);
    }
    lines.push(`- Type: ${details.issueType}`, `- Status: ${details.currentStatus}`);
    if (details.permissionFieldName !== undefined) {
      lines.push(
        `- Permission Field: ${details.permissionFieldName}`,
        `- Permission Value: ${details.permissionFieldValue ?? 'Unknown'}`,
      );
    }
    if (errors.length > 0) {
      lines.push('', '**Validation Errors:**', ...errors.map((e) => `- ${e}`));
    }
    reporter.publish(lines.join('\n'));

    if (!valid) {
      throw new CommandError(`Validation failed: ${errors.join('; ')}`);
    }
  }
}
