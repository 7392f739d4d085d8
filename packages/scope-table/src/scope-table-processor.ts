import type { LoggerMethods } from '@relscope/logger';
import type {
  ComponentLookupResult,
  ComponentUpsertInput,
  ConflictPolicy,
  JsonValue,
  ScopeTable,
  SpliceMode,
} from '@relscope/model';

import { isEmpty } from 'es-toolkit/compat';

import { TableBuilder } from './builders';
import { TableExtractor } from './extractors';
import { ComponentLookup } from './lookup';
import { TreeSplicer } from './splicers';
import { TableUpsertEngine } from './upsert';
import { MarkdownConverter } from './utils';

/**
 * ScopeTableProcessor Options
 */
export interface ScopeTableProcessorOptions {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Behaviour when the component already has a row (default: 'reject')
   */
  conflictPolicy?: ConflictPolicy;
}

/**
 * What was found in a description
 */
export interface ScopeTableReadResult {
  hasDescription: boolean;
  hasTable: boolean;
  /** Decoded first table, or null when there is none */
  table: ScopeTable | null;
}

interface ScopeTableUpsertResultBase {
  hasDescription: boolean;
  /** Whether the description held a table before the upsert */
  hadTable: boolean;
  /** Table after the upsert (unchanged on conflict) */
  table: ScopeTable;
  /** Markdown rendering of `table` */
  markdown: string;
}

export interface ScopeTableAppliedResult extends ScopeTableUpsertResultBase {
  status: 'added' | 'updated';
  row: string[];
  /** Row before an update; null for an added row */
  previousRow: string[] | null;
  /** Description with the new table spliced in */
  description: JsonValue;
  spliceMode: SpliceMode;
}

export interface ScopeTableConflictResult extends ScopeTableUpsertResultBase {
  status: 'conflict';
  conflictingRow: string[];
}

export type ScopeTableUpsertResult =
  | ScopeTableAppliedResult
  | ScopeTableConflictResult;

export interface ScopeTableLookupResult extends ComponentLookupResult {
  hasDescription: boolean;
  hasTable: boolean;
  table: ScopeTable | null;
  markdown: string;
}

/**
 * ScopeTableProcessor
 *
 * Runs the read → upsert → build → splice pipeline over one issue description.
 *
 * ## Upsert Process
 *
 * 1. TableExtractor - decode the first table (if any)
 * 2. TableUpsertEngine - add or update the component row
 * 3. TableBuilder - encode the resulting table as an ADF node
 * 4. TreeSplicer - put the node back into the description
 *
 * A conflict stops after step 2; the description is left as it was.
 *
 * @example
 * ```typescript
 * import { getLogger } from '@relscope/logger';
 * import { ScopeTableProcessor } from '@relscope/scope-table';
 *
 * const processor = new ScopeTableProcessor({ logger: getLogger() });
 * const result = processor.upsert(issue.fields.description, {
 *   component: 'svc-b',
 *   branchName: 'release/2.0',
 * });
 *
 * if (result.status !== 'conflict') {
 *   await client.updateDescription(issue.key, result.description);
 * }
 * ```
 */
export class ScopeTableProcessor {
  private readonly logger: LoggerMethods;
  private readonly extractor: TableExtractor;
  private readonly engine: TableUpsertEngine;
  private readonly splicer: TreeSplicer;

  constructor(options: ScopeTableProcessorOptions) {
    this.logger = options.logger;
    this.extractor = new TableExtractor(options.logger);
    this.engine = new TableUpsertEngine(options.logger, {
      conflictPolicy: options.conflictPolicy,
    });
    this.splicer = new TreeSplicer(options.logger);
  }

  /**
   * Decode the first table of a description
   */
  read(description: JsonValue | undefined): ScopeTableReadResult {
    const hasDescription = !isEmpty(description);
    const table = hasDescription ? this.extractor.findTable(description) : null;
    const hasTable =
      table !== null && (table.headers.length > 0 || table.rows.length > 0);

    return { hasDescription, hasTable, table: hasTable ? table : null };
  }

  /**
   * Upsert one component row and splice the result into the description
   *
   * @throws {EmptyComponentKeyError} When the component is blank
   * @throws {SchemaMismatchError} When the existing table has other columns
   */
  upsert(
    description: JsonValue | undefined,
    input: ComponentUpsertInput,
  ): ScopeTableUpsertResult {
    const { hasDescription, hasTable, table } = this.read(description);
    const outcome = this.engine.upsert(table, input);
    const result: ScopeTable = { headers: outcome.headers, rows: outcome.rows };
    const markdown = MarkdownConverter.tableToMarkdown(
      result.headers,
      result.rows,
    );

    if (outcome.status === 'conflict') {
      return {
        status: 'conflict',
        hasDescription,
        hadTable: hasTable,
        table: result,
        markdown,
        conflictingRow: outcome.conflictingRow,
      };
    }

    const tableNode = TableBuilder.build(result.headers, result.rows);
    const spliced = this.splicer.splice(description, tableNode);
    this.logger.info(
      `[ScopeTableProcessor] Component ${outcome.status}, table ${spliced.mode} (${result.rows.length} row(s))`,
    );

    return {
      status: outcome.status,
      hasDescription,
      hadTable: hasTable,
      table: result,
      markdown,
      row: outcome.row,
      previousRow: outcome.status === 'updated' ? outcome.previousRow : null,
      description: spliced.tree,
      spliceMode: spliced.mode,
    };
  }

  /**
   * Look up a component and its release branch in the description's table
   */
  lookup(
    description: JsonValue | undefined,
    component: string,
    releaseBranch: string,
  ): ScopeTableLookupResult {
    const { hasDescription, hasTable, table } = this.read(description);
    const result = ComponentLookup.lookup(table, component, releaseBranch);

    return {
      ...result,
      hasDescription,
      hasTable,
      table,
      markdown: table
        ? MarkdownConverter.tableToMarkdown(table.headers, table.rows)
        : '',
    };
  }
}
