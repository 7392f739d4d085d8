import type {
  AdfNodeView,
  JsonArray,
  JsonObject,
  JsonValue,
} from '@relscope/model';

import { isPlainObject } from 'es-toolkit';

/**
 * Narrow a JSON value to a keyed mapping
 */
export function isJsonObject(
  value: JsonValue | undefined,
): value is JsonObject {
  return isPlainObject(value);
}

/**
 * Classify a raw description value into a tagged node view.
 *
 * Known node types with a missing or non-list `content` get an empty child
 * list; text runs whose `text` is not a string, and anything that is not a
 * mapping, become `unknown`. Never throws.
 */
export function classifyNode(value: JsonValue | undefined): AdfNodeView {
  if (!isJsonObject(value)) {
    return { kind: 'unknown', value };
  }

  const content = value.content;
  const children: JsonArray | null = Array.isArray(content) ? content : null;

  switch (value.type) {
    case 'text': {
      const text = value.text;
      return typeof text === 'string'
        ? { kind: 'textRun', node: value, text }
        : { kind: 'unknown', value };
    }
    case 'doc':
      return { kind: 'document', node: value, children: children ?? [] };
    case 'paragraph':
      return { kind: 'paragraph', node: value, children: children ?? [] };
    case 'table':
      return { kind: 'table', node: value, children: children ?? [] };
    case 'tableRow':
      return { kind: 'row', node: value, children: children ?? [] };
    case 'tableHeader':
      return { kind: 'headerCell', node: value, children: children ?? [] };
    case 'tableCell':
      return { kind: 'dataCell', node: value, children: children ?? [] };
    default:
      return children
        ? { kind: 'container', node: value, children }
        : { kind: 'unknown', value };
  }
}

/**
 * Ordered children of a classified node (empty for leaves and unknown values)
 */
export function childrenOf(view: AdfNodeView): JsonArray {
  return view.kind === 'textRun' || view.kind === 'unknown'
    ? []
    : view.children;
}
