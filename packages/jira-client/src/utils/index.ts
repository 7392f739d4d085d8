export { getFieldDisplayValue, getIssueOverview } from './issue-fields';
export type { IssueOverview } from './issue-fields';
