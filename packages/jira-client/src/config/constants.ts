/**
 * REST paths used by the client, relative to the site base URL
 */
export const JIRA_API_PATHS = {
  ISSUE: '/rest/api/3/issue',
  FIELD: '/rest/api/3/field',
  SEARCH: '/rest/api/3/search/jql',
} as const;

/**
 * Fields requested for every issue read
 */
export const DEFAULT_ISSUE_FIELDS = [
  'issuetype',
  'description',
  'summary',
  'status',
] as const;

/**
 * Fields requested for each issue of a JQL search
 */
export const DEFAULT_SEARCH_FIELDS = [
  'key',
  'summary',
  'issuetype',
  'status',
  'description',
] as const;

/** Page size for JQL searches */
export const SEARCH_MAX_RESULTS = 100;

/** Per-request timeout */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** Characters of an error response body kept in error messages */
export const ERROR_BODY_PREVIEW_LENGTH = 500;

/** Permission field value that allows an upsert (compared case-insensitively) */
export const UPSERT_PERMISSION_ALLOWED_VALUE = 'allowed';
