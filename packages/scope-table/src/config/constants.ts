/**
 * Column layout every upsert-capable scope table must have, in order.
 * Compared trimmed and case-insensitively.
 */
export const CANONICAL_SCHEMA = [
  'Order',
  'Component',
  'Branch Name',
  'Change Request',
  'External Dependency',
] as const;

/**
 * Column indices into a canonical scope table row
 */
export const SCOPE_TABLE_COLUMNS = {
  ORDER: 0,
  COMPONENT: 1,
  BRANCH_NAME: 2,
  CHANGE_REQUEST: 3,
  EXTERNAL_DEPENDENCY: 4,
} as const;

/**
 * Prefix for positional headers synthesized when a table has no header row
 */
export const SYNTHESIZED_HEADER_PREFIX = 'Col';
