/**
 * Commands accepted by `--command`
 */
export const COMMANDS = [
  'upsert',
  'lookup',
  'get-state',
  'validate-upsert-prereqs',
] as const;

export const DEFAULT_ISSUE_TYPE = 'REL-SCOPE';

/**
 * Statuses in which upserts are refused unless `--blocked-statuses` is given
 */
export const DEFAULT_BLOCKED_STATUSES = ['APPROVED', 'CLOSED'] as const;

/** Characters of the prepared payload shown in the summary when updates are skipped */
export const PAYLOAD_PREVIEW_LENGTH = 2000;

/**
 * Required arguments per command, as reported when one is missing
 */
export const REQUIRED_ARGUMENTS_MESSAGES = {
  upsert:
    'Upsert command requires --jira-key, --branch-name, and --component arguments',
  lookup:
    'Lookup command requires --project, --state, --release-branch, and --component arguments',
  'get-state': 'Get-state command requires --jira-key argument',
  'validate-upsert-prereqs':
    'Validate-upsert-prereqs command requires --jira-key argument',
} as const;

/**
 * Environment variables that must be set for any command
 */
export const REQUIRED_CREDENTIALS = [
  'JIRA_BASE_URL',
  'JIRA_API_TOKEN',
  'JIRA_EMAIL',
] as const;

/** RELSCOPE_SKIP_UPDATE values that leave updates enabled */
export const FALSY_FLAG_VALUES = ['0', 'false', 'no', 'off'] as const;
