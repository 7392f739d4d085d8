export type {
  AdfDocNode,
  AdfNodeView,
  AdfParagraphNode,
  AdfTableCellNode,
  AdfTableHeaderNode,
  AdfTableNode,
  AdfTableRowNode,
  AdfTextNode,
  JsonArray,
  JsonObject,
  JsonPrimitive,
  JsonValue,
} from './adf-document';
export type {
  ComponentLookupResult,
  ComponentUpsertInput,
  ConflictPolicy,
  SpliceMode,
  SpliceResult,
  ScopeTable,
  UpsertAddedOutcome,
  UpsertConflictOutcome,
  UpsertOutcome,
  UpsertUpdatedOutcome,
} from './scope-table';
