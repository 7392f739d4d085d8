// Raw JSON shape of an issue description as returned by the REST API
export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

// Node shapes produced by the table builder.
// Declared as type aliases so they stay assignable to JsonValue.
export type AdfTextNode = {
  type: 'text';
  text: string;
};

export type AdfParagraphNode = {
  type: 'paragraph';
  content: AdfTextNode[];
};

export type AdfTableHeaderNode = {
  type: 'tableHeader';
  content: AdfParagraphNode[];
};

export type AdfTableCellNode = {
  type: 'tableCell';
  content: AdfParagraphNode[];
};

export type AdfTableRowNode = {
  type: 'tableRow';
  content: AdfTableHeaderNode[] | AdfTableCellNode[];
};

export type AdfTableNode = {
  type: 'table';
  content: AdfTableRowNode[];
};

// Root document (version is always 1 for ADF)
export type AdfDocNode = {
  type: 'doc';
  version: 1;
  content: JsonValue[];
};

/**
 * Classified view of a raw description node.
 *
 * Every JSON value maps to exactly one kind. `container` covers mappings
 * with an ordered `content` list whose type is not otherwise recognised
 * (lists, panels, expands, layout columns); `unknown` keeps the value opaque.
 */
export type AdfNodeView =
  | { kind: 'document'; node: JsonObject; children: JsonArray }
  | { kind: 'paragraph'; node: JsonObject; children: JsonArray }
  | { kind: 'textRun'; node: JsonObject; text: string }
  | { kind: 'table'; node: JsonObject; children: JsonArray }
  | { kind: 'row'; node: JsonObject; children: JsonArray }
  | { kind: 'headerCell'; node: JsonObject; children: JsonArray }
  | { kind: 'dataCell'; node: JsonObject; children: JsonArray }
  | { kind: 'container'; node: JsonObject; children: JsonArray }
  | { kind: 'unknown'; value: JsonValue | undefined };
