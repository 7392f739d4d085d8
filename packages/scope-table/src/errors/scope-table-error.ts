import { CANONICAL_SCHEMA } from '../config/constants';

/**
 * ScopeTableError
 *
 * Base error class for scope table upsert failures.
 */
export class ScopeTableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ScopeTableError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * SchemaMismatchError
 *
 * Thrown when the decoded headers differ from the canonical schema.
 * No rows are touched when this is raised.
 */
export class SchemaMismatchError extends ScopeTableError {
  readonly expectedHeaders: readonly string[];
  readonly actualHeaders: string[];

  constructor(
    actualHeaders: string[],
    expectedHeaders: readonly string[] = CANONICAL_SCHEMA,
  ) {
    super(
      `Table headers do not match expected schema. Expected headers: ${expectedHeaders.join(', ')}`,
    );
    this.name = 'SchemaMismatchError';
    this.expectedHeaders = expectedHeaders;
    this.actualHeaders = actualHeaders;
  }
}

/**
 * EmptyComponentKeyError
 *
 * Thrown when an upsert is requested without a component name.
 */
export class EmptyComponentKeyError extends ScopeTableError {
  constructor(message = 'Component value is required for an upsert') {
    super(message);
    this.name = 'EmptyComponentKeyError';
  }
}

/**
 * DuplicateComponentError
 *
 * Raised when the reject policy refuses to overwrite an existing row.
 */
export class DuplicateComponentError extends ScopeTableError {
  readonly component: string;
  readonly conflictingRow: string[];

  constructor(component: string, conflictingRow: string[]) {
    super(
      `Upsert aborted: Component '${component}' already exists in table (Order ${conflictingRow[0] ?? ''}). This action is configured not to overwrite existing rows.`,
    );
    this.name = 'DuplicateComponentError';
    this.component = component;
    this.conflictingRow = conflictingRow;
  }
}
