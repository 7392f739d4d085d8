import type { LookupArgs } from '../cli-args';
import type { CommandContext } from './types';

import { getIssueOverview } from '@relscope/jira-client';
import {
  MarkdownConverter,
  SCOPE_TABLE_COLUMNS,
  ScopeTableProcessor,
} from '@relscope/scope-table';

import { CommandError } from '../errors';

/**
 * LookupCommand
 *
 * Finds the single scope issue of a project in a given status and checks
 * that the component is listed with the expected release branch.
 */
export class LookupCommand {
  constructor(private readonly context: CommandContext) {}

  async run(args: LookupArgs): Promise<void> {
    const { gateway, reporter, logger } = this.context;
    const scope = `${args.issueType} tickets found in project '${args.project}' with state '${args.state}'`;

    const { issues } = await gateway.searchIssues(LookupCommand.buildJql(args));
    if (issues.length === 0) {
      const message = `No ${scope}`;
      reporter.appendSummary(`**${message}**`);
      throw new CommandError(message);
    }
    if (issues.length > 1) {
      const heading = `Multiple ${scope}:`;
      const found = [
        `Found ${issues.length} tickets:`,
        ...issues.map(
          (issue) => `- **${issue.key}**: ${issue.fields.summary ?? 'No summary'}`,
        ),
      ].join('\n');
      reporter.appendSummary(`**${heading}**\n\n${found}`);
      throw new CommandError(`${heading}\n\n${found}`);
    }

    const [issue] = issues;
    const overview = getIssueOverview(issue);
    reporter.setOutput('found_ticket_key', issue.key);

    const processor = new ScopeTableProcessor({ logger });
    const result = processor.lookup(
      overview.description,
      args.component,
      args.releaseBranch,
    );
    const headers = result.table?.headers ?? [];
    const rows = result.table?.rows ?? [];

    reporter.setOutput('has_description', result.hasDescription);
    reporter.setOutput('has_table', result.hasTable);
    reporter.setOutput('component_found', result.componentFound);
    reporter.setOutput('branch_matches', result.branchMatches);
    reporter.setOutput('matching_row_json', result.matchingRow ?? []);

    const lines = [
      `### Lookup Results for Project: **${args.project}**`,
      `- State: **${args.state}**`,
      `- Component: **${args.component}**`,
      `- Release Branch: **${args.releaseBranch}**`,
      `- Found ticket: **${issue.key}**`,
      `- Component found: **${result.componentFound}**`,
      `- Branch matches: **${result.branchMatches}**`,
    ];
    if (result.hasTable) {
      lines.push('', '**Table in found ticket:**', '', result.markdown);
    }
    if (result.matchingRow) {
      lines.push(
        '',
        '**Matching row:**',
        '',
        MarkdownConverter.tableToMarkdown(headers, [result.matchingRow]),
      );
    } else if (result.componentRow) {
      lines.push(
        '',
        "**Component found but branch doesn't match:**",
        '',
        MarkdownConverter.tableToMarkdown(headers, [result.componentRow]),
      );
    }
    reporter.publish(lines.join('\n'));

    if (!result.componentRow) {
      const notFound = `Component '${args.component}' not found in ticket ${issue.key}`;
      if (!result.hasTable) {
        throw new CommandError(`${notFound} - ticket has no table`);
      }
      throw new CommandError(
        `${notFound}\n\n**Available components in the table:**\n${LookupCommand.listComponents(rows.length, result.availableComponents)}`,
      );
    }

    if (!result.branchMatches) {
      const actual = (
        result.componentRow[SCOPE_TABLE_COLUMNS.BRANCH_NAME] ?? ''
      ).trim();
      throw new CommandError(
        [
          `Component '${args.component}' found in ticket ${issue.key} but release branch does not match`,
          '',
          `**Expected:** \`${args.releaseBranch}\``,
          `**Actual:** \`${actual}\``,
          '',
          '**Component row details:**',
          MarkdownConverter.tableToMarkdown(headers, [result.componentRow]),
        ].join('\n'),
      );
    }

    reporter.setOutput('lookup_result', 'success');
  }

  static buildJql(args: LookupArgs): string {
    return `project = "${args.project}" AND issuetype = "${args.issueType}" AND status = "${args.state}"`;
  }

  private static listComponents(rowCount: number, names: string[]): string {
    if (rowCount === 0) {
      return '- Table is empty';
    }
    if (names.length === 0) {
      return '- No components found in table';
    }
    return names.map((name) => `- ${name}`).join('\n');
  }
}
