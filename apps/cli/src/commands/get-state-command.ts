import type { GetStateArgs } from '../cli-args';
import type { CommandContext } from './types';

import { getIssueOverview } from '@relscope/jira-client';

/**
 * GetStateCommand
 *
 * Reports the status and summary of one issue.
 */
export class GetStateCommand {
  constructor(private readonly context: CommandContext) {}

  async run(args: GetStateArgs): Promise<void> {
    const { gateway, reporter } = this.context;
    const issue = await gateway.getIssue(
      args.jiraKey,
      args.permissionFieldId ? [args.permissionFieldId] : [],
    );
    const overview = getIssueOverview(issue);

    reporter.setOutput('ticket_status', overview.status);
    reporter.setOutput('ticket_key', args.jiraKey);
    reporter.setOutput('ticket_summary', overview.summary);

    reporter.publish(
      [
        `### Get State: **${args.jiraKey}**${overview.summary ? `: ${overview.summary}` : ''}`,
        `- Current status: **${overview.status}**`,
      ].join('\n'),
    );
  }
}
