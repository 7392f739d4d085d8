import type { LoggerMethods } from '@relscope/logger';

import type { JiraIssue } from '../schemas';
import type { JiraGateway } from '../types';

import { UPSERT_PERMISSION_ALLOWED_VALUE } from '../config/constants';
import { getFieldDisplayValue, getIssueOverview } from '../utils';

/**
 * UpsertPrerequisiteValidator options
 */
export interface UpsertPrerequisiteOptions {
  /**
   * Issue type the issue must have (exact match)
   */
  issueType: string;

  /**
   * Custom field that must read 'Allowed' (skipped when not set)
   */
  permissionFieldId?: string;

  /**
   * Statuses in which upserts are refused (case-insensitive)
   */
  blockedStatuses: readonly string[];
}

export interface UpsertPrerequisiteDetails {
  issueType: string;
  issueSummary: string;
  currentStatus: string;
  permissionFieldName?: string;
  permissionFieldValue?: string;
}

export interface UpsertPrerequisiteResult {
  valid: boolean;
  errors: string[];
  details: UpsertPrerequisiteDetails;
  /** The issue as read for validation, with the permission field */
  issue: JiraIssue;
}

/**
 * UpsertPrerequisiteValidator
 *
 * Decides whether an issue may have its scope table changed. All checks run
 * and every failure is collected; nothing throws for a failed check.
 */
export class UpsertPrerequisiteValidator {
  constructor(
    private readonly gateway: JiraGateway,
    private readonly logger: LoggerMethods,
  ) {}

  async validate(
    issueKey: string,
    options: UpsertPrerequisiteOptions,
  ): Promise<UpsertPrerequisiteResult> {
    const { permissionFieldId, blockedStatuses } = options;
    const issue = await this.gateway.getIssue(
      issueKey,
      permissionFieldId ? [permissionFieldId] : [],
    );
    const overview = getIssueOverview(issue);
    const errors: string[] = [];
    const details: UpsertPrerequisiteDetails = {
      issueType: overview.issueType,
      issueSummary: overview.summary,
      currentStatus: overview.status,
    };

    if (overview.issueType !== options.issueType) {
      errors.push(
        `Issue ${issueKey} is not of type ${options.issueType} (current: ${overview.issueType})`,
      );
    }

    if (permissionFieldId) {
      const fieldName = await this.gateway.getFieldName(permissionFieldId);
      details.permissionFieldName = fieldName;

      const value = getFieldDisplayValue(issue, permissionFieldId);
      if (value === null) {
        errors.push(
          `Upsert permission field '${fieldName}' (${permissionFieldId}) is not accessible or does not exist`,
        );
      } else {
        details.permissionFieldValue = value;
        if (value.trim().toLowerCase() !== UPSERT_PERMISSION_ALLOWED_VALUE) {
          errors.push(
            `Upsert permission field '${fieldName}' is not set to 'Allowed' (current value: '${value}')`,
          );
        }
      }
    }

    const blocked = blockedStatuses.map((status) => status.toUpperCase());
    if (blocked.includes(overview.status.toUpperCase())) {
      errors.push(
        `Ticket is in '${overview.status}' status. Blocked statuses: ${blockedStatuses.join(', ')}`,
      );
    }

    if (errors.length > 0) {
      this.logger.warn(
        `[UpsertPrerequisiteValidator] ${issueKey} failed ${errors.length} check(s)`,
      );
    } else {
      this.logger.info(
        `[UpsertPrerequisiteValidator] ${issueKey} passed all checks`,
      );
    }

    return { valid: errors.length === 0, errors, details, issue };
  }
}
