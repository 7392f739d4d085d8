import type {
  AdfParagraphNode,
  AdfTableCellNode,
  AdfTableHeaderNode,
  AdfTableNode,
  AdfTableRowNode,
} from '@relscope/model';

/**
 * TableBuilder
 *
 * Encodes headers and rows as an ADF table node: one `tableHeader` row
 * followed by `tableCell` rows, each cell holding a single paragraph.
 * Without headers the header row is left out, since ADF rows need a cell.
 *
 * `TableExtractor.decode(TableBuilder.build(h, r))` returns `(h, r)` for any
 * already normalized table.
 */
export class TableBuilder {
  static build(headers: string[], rows: string[][]): AdfTableNode {
    return {
      type: 'table',
      content: [
        ...(headers.length > 0 ? [TableBuilder.headerRow(headers)] : []),
        ...rows.map((row) => TableBuilder.dataRow(row)),
      ],
    };
  }

  static headerRow(headers: string[]): AdfTableRowNode {
    return {
      type: 'tableRow',
      content: headers.map(
        (text): AdfTableHeaderNode => ({
          type: 'tableHeader',
          content: [TableBuilder.paragraph(text)],
        }),
      ),
    };
  }

  static dataRow(values: string[]): AdfTableRowNode {
    return {
      type: 'tableRow',
      content: values.map(
        (text): AdfTableCellNode => ({
          type: 'tableCell',
          content: [TableBuilder.paragraph(text)],
        }),
      ),
    };
  }

  /**
   * Paragraph holding `text`; empty for an empty string, since ADF text
   * nodes must not be empty
   */
  static paragraph(text: string): AdfParagraphNode {
    return {
      type: 'paragraph',
      content: text ? [{ type: 'text', text }] : [],
    };
  }
}
