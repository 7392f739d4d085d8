import type { JsonObject, JsonValue } from '@relscope/model';

import type { JiraIssue, JiraSearchResult } from './schemas';

/**
 * Body sent to update an issue description
 */
export interface DescriptionUpdatePayload {
  fields: {
    description: JsonObject;
  };
}

export interface DescriptionUpdateResult {
  /** False when updates are skipped and nothing was sent */
  applied: boolean;
  payload: DescriptionUpdatePayload;
}

/**
 * Operations the commands need from Jira
 *
 * Implemented by JiraClient; tests substitute an in-memory fake.
 */
export interface JiraGateway {
  getIssue(key: string, extraFields?: string[]): Promise<JiraIssue>;
  getFieldName(fieldId: string): Promise<string>;
  searchIssues(jql: string, fields?: readonly string[]): Promise<JiraSearchResult>;
  updateDescription(
    key: string,
    description: JsonValue,
  ): Promise<DescriptionUpdateResult>;
}
