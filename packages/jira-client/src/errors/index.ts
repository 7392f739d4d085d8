export {
  JiraApiError,
  JiraError,
  JiraIssueNotFoundError,
  JiraResponseError,
} from './jira-error';
