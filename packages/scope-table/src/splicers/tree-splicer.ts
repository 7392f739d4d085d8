import type { LoggerMethods } from '@relscope/logger';
import type {
  AdfDocNode,
  AdfTableNode,
  JsonObject,
  JsonValue,
  SpliceResult,
} from '@relscope/model';

import { classifyNode, isJsonObject } from '../parsers';

/**
 * TreeSplicer
 *
 * Puts a table node into a description tree, replacing the first existing
 * table when there is one.
 *
 * Returns a new tree: nodes on the path to the change are copied, every other
 * subtree is shared with the input, and the input is never mutated.
 */
export class TreeSplicer {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Splice `table` into `tree`
   *
   * 1. Absent, non-mapping or empty-mapping tree: new document holding only the table
   * 2. First table in pre-order: replaced at the same position
   * 3. No table but a root `content` list: appended to it
   * 4. Otherwise: new document holding the original tree, then the table
   */
  splice(tree: JsonValue | undefined, table: AdfTableNode): SpliceResult {
    if (!isJsonObject(tree) || Object.keys(tree).length === 0) {
      this.logger.info(
        '[TreeSplicer] Description is empty, creating a new document',
      );
      return { tree: TreeSplicer.createDocument([table]), mode: 'synthesized' };
    }

    const replaced = TreeSplicer.replaceFirstTable(tree, table);
    if (replaced !== undefined) {
      this.logger.info('[TreeSplicer] Replaced existing table');
      return { tree: replaced, mode: 'replaced' };
    }

    const content = tree.content;
    if (Array.isArray(content)) {
      this.logger.info('[TreeSplicer] No table found, appending to content');
      return { tree: { ...tree, content: [...content, table] }, mode: 'appended' };
    }

    this.logger.warn(
      '[TreeSplicer] Description has no content list, wrapping it in a new document',
    );
    return {
      tree: TreeSplicer.createDocument([tree, table]),
      mode: 'synthesized',
    };
  }

  /**
   * Wrap a tree in a `doc` root unless it already is one
   */
  static toDocument(tree: JsonValue): JsonObject {
    if (isJsonObject(tree) && tree.type === 'doc') {
      return tree;
    }
    return TreeSplicer.createDocument([tree]);
  }

  static createDocument(content: JsonValue[]): AdfDocNode {
    return { type: 'doc', version: 1, content };
  }

  /**
   * Copy of `value` with its first table swapped for `table`
   *
   * @returns undefined when `value` contains no table
   */
  private static replaceFirstTable(
    value: JsonValue,
    table: AdfTableNode,
  ): JsonValue | undefined {
    if (Array.isArray(value)) {
      for (let i = 0; i < value.length; i++) {
        const replaced = TreeSplicer.replaceFirstTable(value[i], table);
        if (replaced !== undefined) {
          return value.map((item, index) => (index === i ? replaced : item));
        }
      }
      return undefined;
    }

    if (!isJsonObject(value)) {
      return undefined;
    }
    if (classifyNode(value).kind === 'table') {
      return table;
    }

    for (const [key, child] of Object.entries(value)) {
      const replaced = TreeSplicer.replaceFirstTable(child, table);
      if (replaced !== undefined) {
        return { ...value, [key]: replaced };
      }
    }
    return undefined;
  }
}
