/**
 * MarkdownConverter
 *
 * Renders decoded tables as GitHub-flavoured Markdown for run summaries
 * and workflow outputs.
 */
export class MarkdownConverter {
  /**
   * Convert headers and rows to a Markdown table
   *
   * @example
   * Output:
   * | Order | Component | Branch Name |
   * | --- | --- | --- |
   * | 0 | svc-a | main |
   *
   * @returns Empty string when there are no headers
   */
  static tableToMarkdown(headers: string[], rows: string[][]): string {
    if (headers.length === 0) {
      return '';
    }

    const lines = [
      MarkdownConverter.toLine(headers),
      MarkdownConverter.toLine(headers.map(() => '---')),
    ];
    for (const row of rows) {
      lines.push(
        MarkdownConverter.toLine(headers.map((_, index) => row[index] ?? '')),
      );
    }

    return lines.join('\n');
  }

  private static toLine(cells: string[]): string {
    const escaped = cells.map((cell) => MarkdownConverter.escapeTableCell(cell));
    return `| ${escaped.join(' | ')} |`;
  }

  /**
   * Escape special characters in table cell content
   */
  private static escapeTableCell(text: string): string {
    return text.replace(/\|/g, '\\|').replace(/\n/g, ' ').trim();
  }
}
