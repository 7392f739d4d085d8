/**
 * @relscope/scope-table
 *
 * Release-scope table handling for ADF issue descriptions.
 *
 * ## Key Features
 *
 * - First-table discovery anywhere in the description tree
 * - Table decoding with header synthesis and row padding
 * - Component-keyed upsert with stable Order values
 * - Immutable splicing of the rebuilt table back into the tree
 * - Component and branch lookup
 * - Markdown rendering for run summaries
 *
 * @packageDocumentation
 */

export { ScopeTableProcessor } from './scope-table-processor';
export type {
  ScopeTableAppliedResult,
  ScopeTableConflictResult,
  ScopeTableLookupResult,
  ScopeTableProcessorOptions,
  ScopeTableReadResult,
  ScopeTableUpsertResult,
} from './scope-table-processor';
export { TableBuilder } from './builders';
export { TableExtractor, TextExtractor } from './extractors';
export { ComponentLookup } from './lookup';
export { childrenOf, classifyNode, isJsonObject } from './parsers';
export { TreeSplicer } from './splicers';
export { TableUpsertEngine } from './upsert';
export type { TableUpsertEngineOptions } from './upsert';
export { MarkdownConverter } from './utils';
export {
  DuplicateComponentError,
  EmptyComponentKeyError,
  SchemaMismatchError,
  ScopeTableError,
} from './errors';
export {
  CANONICAL_SCHEMA,
  SCOPE_TABLE_COLUMNS,
  SYNTHESIZED_HEADER_PREFIX,
} from './config/constants';
