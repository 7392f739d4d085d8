import type { LoggerMethods } from '@relscope/logger';
import type { JsonValue } from '@relscope/model';

import type { ActionsEnvironment } from '../config/environment';

import { randomUUID } from 'node:crypto';
import { appendFileSync } from 'node:fs';

const HEREDOC_DELIMITER = 'EOF';

/**
 * ActionsReporter options
 */
export interface ActionsReporterOptions extends ActionsEnvironment {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Destination for summaries and workflow commands (default: stdout)
   */
  write?: (text: string) => void;
}

/**
 * ActionsReporter
 *
 * Writes step outputs, the job summary and error annotations using the
 * GitHub Actions file and workflow commands. Outside a workflow run the
 * output and summary files are absent and only stdout is written.
 */
export class ActionsReporter {
  private readonly outputPath?: string;
  private readonly summaryPath?: string;
  private readonly logger: LoggerMethods;
  private readonly write: (text: string) => void;

  constructor(options: ActionsReporterOptions) {
    this.outputPath = options.outputPath;
    this.summaryPath = options.summaryPath;
    this.logger = options.logger;
    this.write =
      options.write ?? ((text: string) => process.stdout.write(text));
  }

  /**
   * Set a step output; non-string values are written as JSON
   *
   * Values containing a newline use the multi-line delimiter syntax.
   */
  setOutput(name: string, value: JsonValue): void {
    if (!this.outputPath) {
      this.logger.debug(
        `[ActionsReporter] No output file, skipping output ${name}`,
      );
      return;
    }

    const text = typeof value === 'string' ? value : JSON.stringify(value);
    if (!text.includes('\n')) {
      appendFileSync(this.outputPath, `${name}=${text}\n`, 'utf-8');
      return;
    }

    const delimiter = text.includes(HEREDOC_DELIMITER)
      ? `${HEREDOC_DELIMITER}_${randomUUID()}`
      : HEREDOC_DELIMITER;
    const body = text.endsWith('\n') ? text : `${text}\n`;
    appendFileSync(
      this.outputPath,
      `${name}<<${delimiter}\n${body}${delimiter}\n`,
      'utf-8',
    );
  }

  /**
   * Append Markdown to the job summary
   */
  appendSummary(markdown: string): void {
    if (!this.summaryPath) {
      return;
    }
    appendFileSync(this.summaryPath, `${markdown}\n`, 'utf-8');
  }

  /**
   * Print a block of text to stdout
   */
  print(text: string): void {
    this.write(`${text}\n`);
  }

  /**
   * Append Markdown to the job summary and print it
   */
  publish(markdown: string): void {
    this.appendSummary(markdown);
    this.print(markdown);
  }

  /**
   * Surface a failure as an annotation, the `error_message` output and a
   * summary line
   */
  reportFailure(message: string): void {
    this.write(`::error::${ActionsReporter.escapeCommandData(message)}\n`);
    this.setOutput('error_message', message);
    this.appendSummary(`**ERROR:** ${message}`);
  }

  /**
   * Escape workflow command data
   */
  static escapeCommandData(text: string): string {
    return text
      .replace(/%/g, '%25')
      .replace(/\r/g, '%0D')
      .replace(/\n/g, '%0A');
  }
}
