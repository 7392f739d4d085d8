import type { LoggerMethods } from '@relscope/logger';
import type { JsonValue } from '@relscope/model';
import type { z } from 'zod';

import type {
  DescriptionUpdatePayload,
  DescriptionUpdateResult,
  JiraGateway,
} from './types';

import { TreeSplicer } from '@relscope/scope-table';

import {
  DEFAULT_ISSUE_FIELDS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_SEARCH_FIELDS,
  JIRA_API_PATHS,
  SEARCH_MAX_RESULTS,
} from './config/constants';
import {
  JiraApiError,
  JiraError,
  JiraIssueNotFoundError,
  JiraResponseError,
} from './errors';
import {
  type JiraIssue,
  JiraFieldListSchema,
  JiraIssueSchema,
  type JiraSearchResult,
  JiraSearchResultSchema,
} from './schemas';

/**
 * JiraClient options
 */
export interface JiraClientOptions {
  /**
   * Site URL, e.g. https://example.atlassian.net
   */
  baseUrl: string;

  /**
   * Account email for basic auth
   */
  email: string;

  /**
   * API token for basic auth
   */
  apiToken: string;

  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Prepare description updates without sending them (default: false)
   */
  skipUpdate?: boolean;

  /**
   * Per-request timeout in milliseconds (default: 30000)
   */
  timeoutMs?: number;

  /**
   * fetch implementation (default: global fetch)
   */
  fetch?: typeof fetch;
}

interface RequestOptions {
  method?: 'GET' | 'PUT';
  query?: Record<string, string>;
  body?: DescriptionUpdatePayload;
}

/**
 * JiraClient
 *
 * Minimal Jira Cloud REST v3 client: issue reads, field metadata, JQL search
 * and description updates. Every response body is validated with zod before
 * it is returned.
 */
export class JiraClient implements JiraGateway {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly logger: LoggerMethods;
  private readonly skipUpdate: boolean;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: JiraClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.authorization = `Basic ${Buffer.from(
      `${options.email}:${options.apiToken}`,
    ).toString('base64')}`;
    this.logger = options.logger;
    this.skipUpdate = options.skipUpdate ?? false;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? fetch;
  }

  /**
   * Read an issue with the default fields plus `extraFields`
   *
   * @throws {JiraIssueNotFoundError} When the issue does not exist
   * @throws {JiraApiError} On any other non-2xx response
   */
  async getIssue(key: string, extraFields: string[] = []): Promise<JiraIssue> {
    const fields = [
      ...DEFAULT_ISSUE_FIELDS,
      ...extraFields.filter((field) => field.length > 0),
    ];
    this.logger.debug(`[JiraClient] Fetching issue ${key}`);

    const response = await this.request(
      `${JIRA_API_PATHS.ISSUE}/${encodeURIComponent(key)}`,
      { query: { fields: fields.join(',') } },
    );
    if (response.status === 404) {
      throw new JiraIssueNotFoundError(key, await response.text());
    }
    await this.ensureOk(response, 'Jira API error');

    return this.parseBody(response, JiraIssueSchema, `issue ${key}`);
  }

  /**
   * Display name of a field
   *
   * @returns The field id itself when Jira does not list it
   */
  async getFieldName(fieldId: string): Promise<string> {
    const response = await this.request(JIRA_API_PATHS.FIELD);
    await this.ensureOk(response, 'Jira field metadata API error');

    const fields = await this.parseBody(
      response,
      JiraFieldListSchema,
      'field metadata',
    );
    return fields.find((field) => field.id === fieldId)?.name ?? fieldId;
  }

  /**
   * Run a JQL search (first page only)
   */
  async searchIssues(
    jql: string,
    fields: readonly string[] = DEFAULT_SEARCH_FIELDS,
  ): Promise<JiraSearchResult> {
    this.logger.debug(`[JiraClient] Searching: ${jql}`);

    const response = await this.request(JIRA_API_PATHS.SEARCH, {
      query: {
        jql,
        fields: fields.join(','),
        maxResults: String(SEARCH_MAX_RESULTS),
      },
    });
    await this.ensureOk(response, 'Jira search API error');

    const result = await this.parseBody(
      response,
      JiraSearchResultSchema,
      'search result',
    );
    this.logger.info(
      `[JiraClient] Search returned ${result.issues.length} issue(s)`,
    );
    return result;
  }

  /**
   * Replace an issue description
   *
   * The description is wrapped in a `doc` root when it is not one.
   * With `skipUpdate` set, the payload is returned without a request.
   */
  async updateDescription(
    key: string,
    description: JsonValue,
  ): Promise<DescriptionUpdateResult> {
    const payload: DescriptionUpdatePayload = {
      fields: { description: TreeSplicer.toDocument(description) },
    };

    if (this.skipUpdate) {
      this.logger.warn(
        `[JiraClient] Updates are disabled, description of ${key} was not sent`,
      );
      return { applied: false, payload };
    }

    const response = await this.request(
      `${JIRA_API_PATHS.ISSUE}/${encodeURIComponent(key)}`,
      { method: 'PUT', body: payload },
    );
    await this.ensureOk(response, 'Failed to update Jira issue description');

    this.logger.info(`[JiraClient] Description of ${key} updated`);
    return { applied: true, payload };
  }

  private async request(
    path: string,
    options: RequestOptions = {},
  ): Promise<Response> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [name, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(name, value);
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: this.authorization,
    };
    if (options.body) {
      headers['Content-Type'] = 'application/json';
    }

    const method = options.method ?? 'GET';
    try {
      return await this.fetchFn(url.toString(), {
        method,
        headers,
        body: options.body ? JSON.stringify(options.body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw JiraError.fromError(`${method} ${url.pathname} failed`, error);
    }
  }

  private async ensureOk(response: Response, context: string): Promise<void> {
    if (!response.ok) {
      throw new JiraApiError(context, response.status, await response.text());
    }
  }

  private async parseBody<T>(
    response: Response,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    label: string,
  ): Promise<T> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new JiraResponseError(`Jira returned invalid JSON for ${label}`, {
        cause: error,
      });
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      throw new JiraResponseError(
        `Unexpected Jira response for ${label}: ${result.error.message}`,
        { cause: result.error },
      );
    }
    return result.data;
  }
}
