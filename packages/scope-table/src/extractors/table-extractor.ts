import type { LoggerMethods } from '@relscope/logger';
import type { JsonObject, JsonValue, ScopeTable } from '@relscope/model';

import { SYNTHESIZED_HEADER_PREFIX } from '../config/constants';
import { childrenOf, classifyNode, isJsonObject } from '../parsers';
import { TextExtractor } from './text-extractor';

/**
 * TableExtractor
 *
 * Locates the first table in a description tree and decodes it into
 * header + data rows of plain text.
 *
 * Traversal is pre-order, depth-first over every mapping value (in key order)
 * and every sequence item; the first table found wins and later tables are
 * never read.
 */
export class TableExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Find and decode the first table
   *
   * @returns The normalized table, or null when the tree has no table
   */
  findTable(tree: JsonValue | undefined): ScopeTable | null {
    const tableNode = TableExtractor.findTableNode(tree);
    if (!tableNode) {
      this.logger.info('[TableExtractor] No table found in description');
      return null;
    }

    const table = TableExtractor.decode(tableNode);
    this.logger.info(
      `[TableExtractor] Found table with ${table.headers.length} column(s) and ${table.rows.length} data row(s)`,
    );
    return table;
  }

  /**
   * Locate the raw node of the first table
   */
  static findTableNode(tree: JsonValue | undefined): JsonObject | null {
    if (Array.isArray(tree)) {
      for (const item of tree) {
        const found = TableExtractor.findTableNode(item);
        if (found) {
          return found;
        }
      }
      return null;
    }

    if (!isJsonObject(tree)) {
      return null;
    }
    if (classifyNode(tree).kind === 'table') {
      return tree;
    }

    for (const value of Object.values(tree)) {
      const found = TableExtractor.findTableNode(value);
      if (found) {
        return found;
      }
    }
    return null;
  }

  /**
   * Decode a table node into normalized headers and rows
   *
   * Row 0 is the header row only when it has cells and all of them are
   * `tableHeader`. Without one, headers are synthesized as Col1..ColN.
   */
  static decode(tableNode: JsonValue): ScopeTable {
    let headers: string[] | null = null;
    const rows: string[][] = [];

    for (const [index, rowNode] of childrenOf(
      classifyNode(tableNode),
    ).entries()) {
      const cells = childrenOf(classifyNode(rowNode));
      const values = cells.map((cell) =>
        TextExtractor.extractAll(childrenOf(classifyNode(cell))).trim(),
      );

      const isHeaderRow =
        index === 0 &&
        cells.length > 0 &&
        cells.every((cell) => classifyNode(cell).kind === 'headerCell');

      if (isHeaderRow) {
        headers = values;
      } else {
        rows.push(values);
      }
    }

    return TableExtractor.normalize(headers, rows);
  }

  /**
   * Pad headers and rows to a common width
   *
   * Width is the longest of the header row and every data row. Applying
   * this to an already normalized table returns an equal table.
   */
  static normalize(headers: string[] | null, rows: string[][]): ScopeTable {
    const width = Math.max(
      headers?.length ?? 0,
      ...rows.map((row) => row.length),
      0,
    );

    return {
      headers: headers
        ? TableExtractor.pad(headers, width)
        : Array.from(
            { length: width },
            (_, i) => `${SYNTHESIZED_HEADER_PREFIX}${i + 1}`,
          ),
      rows: rows.map((row) => TableExtractor.pad(row, width)),
    };
  }

  private static pad(values: string[], width: number): string[] {
    return [
      ...values,
      ...Array.from({ length: width - values.length }, () => ''),
    ];
  }
}
