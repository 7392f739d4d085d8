/**
 * @relscope/jira-client
 *
 * Jira Cloud REST v3 access for release-scope issues: issue reads, field
 * metadata, JQL search, description updates and the checks that gate an
 * upsert.
 *
 * @packageDocumentation
 */

export { JiraClient } from './jira-client';
export type { JiraClientOptions } from './jira-client';
export type {
  DescriptionUpdatePayload,
  DescriptionUpdateResult,
  JiraGateway,
} from './types';
export {
  JiraFieldListSchema,
  JiraIssueFieldsSchema,
  JiraIssueSchema,
  JiraSearchResultSchema,
  JsonValueSchema,
} from './schemas';
export type {
  JiraIssue,
  JiraSearchResult,
} from './schemas';
export {
  JiraApiError,
  JiraError,
  JiraIssueNotFoundError,
  JiraResponseError,
} from './errors';
export { UpsertPrerequisiteValidator } from './validators';
export type {
  UpsertPrerequisiteDetails,
  UpsertPrerequisiteOptions,
  UpsertPrerequisiteResult,
} from './validators';
export { getFieldDisplayValue, getIssueOverview } from './utils';
export type { IssueOverview } from './utils';
export {
  DEFAULT_ISSUE_FIELDS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_SEARCH_FIELDS,
  JIRA_API_PATHS,
  SEARCH_MAX_RESULTS,
} from './config/constants';
