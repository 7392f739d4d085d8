import type { JsonValue } from './adf-document';

/**
 * Decoded, width-normalized table.
 *
 * Every row has exactly `headers.length` cells.
 */
export interface ScopeTable {
  headers: string[];
  rows: string[][];
}

/**
 * Behaviour when the upserted component already has a row
 *
 * - reject: leave the table untouched and report a conflict
 * - merge: overwrite the row's non-key columns with the non-empty supplied values
 */
export type ConflictPolicy = 'reject' | 'merge';

/**
 * Values supplied for one upsert
 */
export interface ComponentUpsertInput {
  component: string;
  branchName?: string;
  changeRequest?: string;
  externalDependency?: string;
}

interface UpsertOutcomeBase {
  headers: string[];
  rows: string[][];
}

export interface UpsertAddedOutcome extends UpsertOutcomeBase {
  status: 'added';
  row: string[];
}

export interface UpsertUpdatedOutcome extends UpsertOutcomeBase {
  status: 'updated';
  row: string[];
  previousRow: string[];
}

export interface UpsertConflictOutcome extends UpsertOutcomeBase {
  status: 'conflict';
  conflictingRow: string[];
}

/**
 * Result of applying one upsert to a table
 */
export type UpsertOutcome =
  | UpsertAddedOutcome
  | UpsertUpdatedOutcome
  | UpsertConflictOutcome;

/**
 * How a table node ended up in the description tree
 *
 * - replaced: the first existing table was swapped in place
 * - appended: added to the end of the root content list
 * - synthesized: a new root document was created around it
 */
export type SpliceMode = 'replaced' | 'appended' | 'synthesized';

export interface SpliceResult {
  tree: JsonValue;
  mode: SpliceMode;
}

/**
 * Outcome of looking a component up in the scope table
 */
export interface ComponentLookupResult {
  componentFound: boolean;
  branchMatches: boolean;
  /** First row whose component matches, regardless of branch */
  componentRow: string[] | null;
  /** Same row, only when its branch matches too */
  matchingRow: string[] | null;
  /** Non-empty component names present in the table */
  availableComponents: string[];
}
