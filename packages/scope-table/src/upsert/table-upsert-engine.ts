import type { LoggerMethods } from '@relscope/logger';
import type {
  ComponentUpsertInput,
  ConflictPolicy,
  ScopeTable,
  UpsertOutcome,
} from '@relscope/model';

import { CANONICAL_SCHEMA, SCOPE_TABLE_COLUMNS } from '../config/constants';
import { EmptyComponentKeyError, SchemaMismatchError } from '../errors';

/**
 * TableUpsertEngine options
 */
export interface TableUpsertEngineOptions {
  /**
   * What to do when the component already has a row (default: 'reject')
   */
  conflictPolicy?: ConflictPolicy;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * TableUpsertEngine
 *
 * Inserts or updates one row of a scope table, keyed by component name.
 *
 * The Order column is an explicit identity: existing values are never
 * renumbered, and a new row takes the next value after the highest integer
 * Order already present.
 */
export class TableUpsertEngine {
  private readonly conflictPolicy: ConflictPolicy;

  constructor(
    private readonly logger: LoggerMethods,
    options?: TableUpsertEngineOptions,
  ) {
    this.conflictPolicy = options?.conflictPolicy ?? 'reject';
  }

  /**
   * Apply an upsert to a table
   *
   * A null table, or one with neither headers nor rows, is treated as an
   * empty table with the canonical schema. Input arrays are not mutated.
   *
   * @throws {EmptyComponentKeyError} When the component is blank
   * @throws {SchemaMismatchError} When the headers are not the canonical schema
   */
  upsert(table: ScopeTable | null, input: ComponentUpsertInput): UpsertOutcome {
    const component = input.component.trim();
    if (!component) {
      throw new EmptyComponentKeyError();
    }

    const source =
      table && (table.headers.length > 0 || table.rows.length > 0)
        ? table
        : null;
    const headers: string[] = source
      ? [...source.headers]
      : [...CANONICAL_SCHEMA];
    const rows: string[][] = source ? source.rows.map((row) => [...row]) : [];

    TableUpsertEngine.validateSchema(headers);

    const matchIndex = TableUpsertEngine.findComponentRow(rows, component);
    if (matchIndex === -1) {
      const row = [
        TableUpsertEngine.nextOrder(rows),
        component,
        input.branchName?.trim() ?? '',
        input.changeRequest?.trim() ?? '',
        input.externalDependency?.trim() ?? '',
      ];
      this.logger.info(
        `[TableUpsertEngine] Adding component "${component}" with Order ${row[SCOPE_TABLE_COLUMNS.ORDER]}`,
      );
      return { status: 'added', headers, rows: [...rows, row], row };
    }

    const existing = rows[matchIndex];
    if (this.conflictPolicy === 'reject') {
      this.logger.warn(
        `[TableUpsertEngine] Component "${component}" already exists (Order ${existing[SCOPE_TABLE_COLUMNS.ORDER]}), refusing to overwrite`,
      );
      return { status: 'conflict', headers, rows, conflictingRow: existing };
    }

    const row = TableUpsertEngine.mergeRow(existing, input);
    this.logger.info(
      `[TableUpsertEngine] Updating component "${component}" (Order ${row[SCOPE_TABLE_COLUMNS.ORDER]})`,
    );
    return {
      status: 'updated',
      headers,
      rows: rows.map((current, index) => (index === matchIndex ? row : current)),
      row,
      previousRow: existing,
    };
  }

  /**
   * Check headers against the canonical schema (trimmed, case-insensitive, ordered)
   *
   * @throws {SchemaMismatchError} On any difference
   */
  static validateSchema(headers: string[]): void {
    const normalize = (value: string): string => value.trim().toLowerCase();
    const matches =
      headers.length === CANONICAL_SCHEMA.length &&
      headers.every(
        (header, i) => normalize(header) === normalize(CANONICAL_SCHEMA[i]),
      );

    if (!matches) {
      throw new SchemaMismatchError(headers);
    }
  }

  /**
   * Index of the first row whose Component matches (trimmed, case-insensitive)
   *
   * @returns The row index, or -1 when absent
   */
  static findComponentRow(rows: string[][], component: string): number {
    const key = component.trim().toLowerCase();
    return rows.findIndex(
      (row) =>
        (row[SCOPE_TABLE_COLUMNS.COMPONENT] ?? '').trim().toLowerCase() === key,
    );
  }

  /**
   * Order value for a newly appended row
   *
   * 1. One more than the highest integer Order cell
   * 2. Without any integer Order, the highest is taken as `rows.length - 1`
   * 3. A negative highest value yields 0
   *
   * Orders are compared as BigInt; they may exceed 2^53.
   */
  static nextOrder(rows: string[][]): string {
    let maxOrder: bigint | null = null;
    for (const row of rows) {
      const value = (row[SCOPE_TABLE_COLUMNS.ORDER] ?? '').trim();
      if (!INTEGER_PATTERN.test(value)) {
        continue;
      }
      const order = BigInt(value);
      if (maxOrder === null || order > maxOrder) {
        maxOrder = order;
      }
    }

    const highest = maxOrder ?? BigInt(rows.length - 1);
    return String(highest >= 0n ? highest + 1n : 0n);
  }

  /**
   * Overwrite the non-key columns with the non-empty supplied values
   */
  private static mergeRow(
    existing: string[],
    input: ComponentUpsertInput,
  ): string[] {
    const replacements: Array<[number, string | undefined]> = [
      [SCOPE_TABLE_COLUMNS.BRANCH_NAME, input.branchName],
      [SCOPE_TABLE_COLUMNS.CHANGE_REQUEST, input.changeRequest],
      [SCOPE_TABLE_COLUMNS.EXTERNAL_DEPENDENCY, input.externalDependency],
    ];

    const row = [...existing];
    for (const [column, value] of replacements) {
      const trimmed = value?.trim();
      if (trimmed) {
        row[column] = trimmed;
      }
    }
    return row;
  }
}
