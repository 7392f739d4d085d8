export {
  JiraFieldListSchema,
  JiraIssueFieldsSchema,
  JiraIssueSchema,
  JiraSearchResultSchema,
  JsonValueSchema,
} from './jira-schemas';
export type {
  JiraIssue,
  JiraSearchResult,
} from './jira-schemas';
