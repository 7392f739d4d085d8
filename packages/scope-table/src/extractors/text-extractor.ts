import type { JsonValue } from '@relscope/model';

import { childrenOf, classifyNode } from '../parsers';

/**
 * TextExtractor
 *
 * Flattens a description node and its descendants into plain text.
 * Marks (bold, links) are dropped; unrecognised shapes contribute nothing.
 */
export class TextExtractor {
  /**
   * Extract the text of a node
   *
   * @example
   * TextExtractor.extract({
   *   type: 'paragraph',
   *   content: [{ type: 'text', text: 'svc-' }, { type: 'text', text: 'a' }],
   * }); // 'svc-a'
   */
  static extract(node: JsonValue | undefined): string {
    const view = classifyNode(node);
    if (view.kind === 'textRun') {
      return view.text;
    }

    return childrenOf(view)
      .map((child) => TextExtractor.extract(child))
      .join('');
  }

  /**
   * Concatenate the text of several sibling nodes
   */
  static extractAll(nodes: JsonValue[]): string {
    return nodes.map((node) => TextExtractor.extract(node)).join('');
  }
}
