import type { ComponentLookupResult, ScopeTable } from '@relscope/model';

import { SCOPE_TABLE_COLUMNS } from '../config/constants';

/**
 * ComponentLookup
 *
 * Answers whether a component is in the release scope, and on which branch.
 * The first row whose component matches decides; the branch must then match
 * exactly (after trimming, case-sensitive).
 */
export class ComponentLookup {
  static lookup(
    table: ScopeTable | null,
    component: string,
    releaseBranch: string,
  ): ComponentLookupResult {
    const rows = table?.rows ?? [];
    const key = component.trim().toLowerCase();
    const componentRow =
      rows.find(
        (row) =>
          (row[SCOPE_TABLE_COLUMNS.COMPONENT] ?? '').trim().toLowerCase() ===
          key,
      ) ?? null;

    const branchMatches =
      componentRow !== null &&
      (componentRow[SCOPE_TABLE_COLUMNS.BRANCH_NAME] ?? '').trim() ===
        releaseBranch.trim();

    return {
      componentFound: componentRow !== null,
      branchMatches,
      componentRow,
      matchingRow: branchMatches ? componentRow : null,
      availableComponents: rows
        .map((row) => (row[SCOPE_TABLE_COLUMNS.COMPONENT] ?? '').trim())
        .filter((name) => name.length > 0),
    };
  }
}
