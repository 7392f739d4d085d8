import type { JsonValue } from '@relscope/model';
import type { ScopeTableAppliedResult } from '@relscope/scope-table';

import type { UpsertArgs } from '../cli-args';
import type { CommandContext } from './types';

import {
  type UpsertPrerequisiteDetails,
  UpsertPrerequisiteValidator,
  getIssueOverview,
} from '@relscope/jira-client';
import {
  DuplicateComponentError,
  MarkdownConverter,
  SCOPE_TABLE_COLUMNS,
  ScopeTableProcessor,
} from '@relscope/scope-table';

import { PAYLOAD_PREVIEW_LENGTH } from '../config/constants';
import { CommandError } from '../errors';

/**
 * UpsertCommand
 *
 * Adds the component to the scope table of an issue and writes the
 * description back.
 *
 * 1. Prerequisite checks (issue type, permission field, blocked statuses)
 * 2. Table upsert and splice
 * 3. Description update, unless updates are skipped
 * 4. Outputs and summary
 *
 * A conflict under the reject policy fails the command after its outputs
 * are written; the issue is not changed.
 */
export class UpsertCommand {
  constructor(private readonly context: CommandContext) {}

  async run(args: UpsertArgs): Promise<void> {
    const { gateway, reporter, logger } = this.context;

    const validator = new UpsertPrerequisiteValidator(gateway, logger);
    const validation = await validator.validate(args.jiraKey, {
      issueType: args.issueType,
      permissionFieldId: args.permissionFieldId,
      blockedStatuses: args.blockedStatuses,
    });
    if (!validation.valid) {
      throw new CommandError(
        `Upsert validation failed: ${validation.errors.join('; ')}`,
      );
    }

    const overview = getIssueOverview(validation.issue);
    reporter.setOutput('is_correct_type', true);
    reporter.setOutput('upsert_permission_allowed', true);
    reporter.setOutput('ticket_status', overview.status);
    reporter.setOutput('status_allows_upsert', true);

    const processor = new ScopeTableProcessor({
      logger,
      conflictPolicy: args.conflictPolicy,
    });
    const result = processor.upsert(overview.description, {
      component: args.component,
      branchName: args.branchName,
      changeRequest: args.changeRequest,
      externalDependency: args.externalDependency,
    });

    reporter.setOutput('has_description', result.hasDescription);
    reporter.setOutput('has_table', result.hadTable);
    reporter.setOutput('table_markdown', result.markdown);
    reporter.setOutput('matched_rows_json', result.table.rows);

    if (result.status === 'conflict') {
      reporter.setOutput('upsert_result', 'conflict');
      reporter.setOutput('upsert_conflict_row_json', result.conflictingRow);
      throw new DuplicateComponentError(args.component, result.conflictingRow);
    }

    reporter.setOutput('upsert_result', result.status);
    reporter.setOutput('upserted_row_json', result.row);

    const update = await gateway.updateDescription(
      args.jiraKey,
      result.description,
    );
    if (update.applied) {
      reporter.setOutput('error_message', '');
      reporter.appendSummary('Description updated in Jira');
    } else {
      reporter.appendSummary(
        '(RELSCOPE_SKIP_UPDATE set) Prepared new description but did not call Jira API.',
      );
      reporter.appendSummary('Prepared payload (truncated):');
      reporter.appendSummary(
        UpsertCommand.preview(update.payload.fields.description),
      );
      reporter.setOutput(
        'error_message',
        'RELSCOPE_SKIP_UPDATE: new description prepared but not applied',
      );
    }

    reporter.publish(
      UpsertCommand.buildSummary(args, overview, validation.details, result),
    );
  }

  /**
   * JSON of `value`, cut to the preview length
   */
  static preview(value: JsonValue): string {
    const json = JSON.stringify(value);
    return json.length < PAYLOAD_PREVIEW_LENGTH
      ? json
      : `${json.slice(0, PAYLOAD_PREVIEW_LENGTH - 3)}...`;
  }

  private static buildSummary(
    args: UpsertArgs,
    overview: { summary: string; status: string },
    details: UpsertPrerequisiteDetails,
    result: ScopeTableAppliedResult,
  ): string {
    const { headers } = result.table;
    const order = result.row[SCOPE_TABLE_COLUMNS.ORDER];
    const lines = [
      `### Jira Issue: **${args.jiraKey}**${overview.summary ? `: ${overview.summary}` : ''}`,
      `- Type is ${args.issueType}: **true**`,
      `- Ticket status: **${overview.status}**`,
      '- Status allows upsert: **true**',
      `- Has description: **${result.hasDescription}**`,
      `- Found table: **${result.hadTable}**`,
    ];
    if (details.permissionFieldName !== undefined) {
      lines.push(
        `- Upsert permission field '${details.permissionFieldName}': **${details.permissionFieldValue ?? 'Not accessible'}**`,
      );
    }

    lines.push(
      '',
      '**Full table (after upsert):**',
      '',
      result.markdown || '_(empty)_',
      '',
      '**Upsert result:**',
      '',
    );

    if (result.previousRow) {
      lines.push(
        `- Updated Component **${args.component}** (Order ${order}):`,
        '',
        '**Before:**',
        '',
        MarkdownConverter.tableToMarkdown(headers, [result.previousRow]),
        '',
        '**After:**',
        '',
        MarkdownConverter.tableToMarkdown(headers, [result.row]),
      );
    } else {
      lines.push(
        `- Added Component **${args.component}** (Order ${order}):`,
        '',
        MarkdownConverter.tableToMarkdown(headers, [result.row]),
      );
    }

    return lines.join('\n');
  }
}
