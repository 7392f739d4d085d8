import { ERROR_BODY_PREVIEW_LENGTH } from '../config/constants';

/**
 * JiraError
 *
 * Base error class for failures talking to Jira.
 */
export class JiraError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'JiraError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create JiraError from unknown error with context
   */
  static fromError(context: string, error: unknown): JiraError {
    return new JiraError(`${context}: ${JiraError.getErrorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * JiraApiError
 *
 * Thrown for a non-2xx response. The message carries the start of the body.
 */
export class JiraApiError extends JiraError {
  readonly status: number;
  readonly body: string;

  constructor(context: string, status: number, body: string) {
    super(
      `${context} ${status}: ${body.slice(0, ERROR_BODY_PREVIEW_LENGTH)}`,
    );
    this.name = 'JiraApiError';
    this.status = status;
    this.body = body;
  }
}

/**
 * JiraIssueNotFoundError
 *
 * Thrown when an issue read returns 404.
 */
export class JiraIssueNotFoundError extends JiraApiError {
  readonly issueKey: string;

  constructor(issueKey: string, body: string) {
    super('Jira API error', 404, body);
    this.message = `Jira issue not found: ${issueKey}`;
    this.name = 'JiraIssueNotFoundError';
    this.issueKey = issueKey;
  }
}

/**
 * JiraResponseError
 *
 * Thrown when a 2xx response is not JSON or does not have the expected shape.
 */
export class JiraResponseError extends JiraError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'JiraResponseError';
  }
}
