import type { JsonValue } from '@relscope/model';

import type { JiraIssue } from '../schemas';

import { isJsonObject } from '@relscope/scope-table';

/**
 * Flattened view of the fields every command reports on
 */
export interface IssueOverview {
  key: string;
  /** Issue type name, '' when absent */
  issueType: string;
  /** Trimmed summary, '' when absent */
  summary: string;
  /** Status name, '' when absent */
  status: string;
  description: JsonValue | undefined;
}

export function getIssueOverview(issue: JiraIssue): IssueOverview {
  const { fields } = issue;
  return {
    key: issue.key,
    issueType: fields.issuetype?.name ?? '',
    summary: (fields.summary ?? '').trim(),
    status: fields.status?.name ?? '',
    description: fields.description,
  };
}

/**
 * Display value of a custom field
 *
 * Select lists yield their `value`, other JSON values their string form.
 *
 * @returns null when the field is missing or null
 */
export function getFieldDisplayValue(
  issue: JiraIssue,
  fieldId: string,
): string | null {
  const raw: JsonValue | undefined = issue.fields[fieldId];
  if (raw === undefined || raw === null) {
    return null;
  }
  if (isJsonObject(raw)) {
    return typeof raw.value === 'string' ? raw.value : '';
  }
  if (Array.isArray(raw)) {
    return JSON.stringify(raw);
  }
  return String(raw);
}
