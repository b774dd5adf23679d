/**
 * Output Formatter
 *
 * Plain status lines for humans, or JSON with --json.
 */

import chalk from 'chalk';
import { StudyRecord, StudyState } from '../../relay/types.js';

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export class OutputFormatter {
  constructor(private readonly jsonMode = false) {}

  get isJson(): boolean {
    return this.jsonMode;
  }

  json(data: unknown): void {
    console.log(formatJson(data));
  }

  success(message: string): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: true, message }));
    } else {
      console.log(chalk.green('✔') + ' ' + message);
    }
  }

  error(message: string, details?: string): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: false, error: message, details }));
    } else {
      console.error(chalk.red('✖') + ' ' + message);
      if (details) {
        console.error(chalk.gray(`  ${details}`));
      }
    }
  }

  warn(message: string): void {
    if (this.jsonMode) {
      console.log(formatJson({ warning: message }));
    } else {
      console.log(chalk.yellow('⚠') + ' ' + message);
    }
  }

  info(message: string): void {
    if (!this.jsonMode) {
      console.log(chalk.blue('ℹ') + ' ' + message);
    }
  }

  /**
   * Label/value lines under a heading
   */
  details(rows: Array<[string, string | number]>): void {
    if (this.jsonMode || rows.length === 0) return;
    const width = Math.max(...rows.map(([label]) => label.length)) + 1;
    for (const [label, value] of rows) {
      console.log(`  ${chalk.gray((label + ':').padEnd(width))} ${value}`);
    }
  }

  studyRecord(record: StudyRecord, durationMs: number): void {
    if (this.jsonMode) {
      this.json({ ...record, durationMs });
      return;
    }
    if (record.state === StudyState.DELIVERED) {
      this.success(`Study ${record.studyInstanceUID} relayed`);
    } else {
      this.error(`Study ${record.studyInstanceUID} not relayed`, record.lastError);
    }
    this.details([
      ['State', record.state],
      ['Delivered', record.deliveredCount],
      ['Duration', formatDuration(durationMs)],
    ]);
  }
}
