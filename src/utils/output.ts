/**
 * Result persistence
 */

import { writeFile } from 'fs/promises';
import type { OutputFormat, OutputSink, ResolvedEntry, ScanReport } from '../core/types.js';

/**
 * One result line: `host -> ip1, ip2 0.42` (duration in seconds)
 */
export function formatResultLine(entry: ResolvedEntry): string {
  return `${entry.hostname} -> ${entry.addresses.join(', ')} ${(entry.duration / 1000).toFixed(2)}`;
}

/**
 * Format results as plain text, one resolved name per line
 */
export function formatText(report: ScanReport): string {
  return report.resolved.map((entry) => `${formatResultLine(entry)}\n`).join('');
}

/**
 * Format results as JSON
 */
export function formatJSON(report: ScanReport): string {
  return JSON.stringify(report, null, 2) + '\n';
}

/**
 * Writes the final report to a file, replacing any previous content
 */
export class FileOutputSink implements OutputSink {
  readonly path: string;
  private format: OutputFormat;

  constructor(path: string, format: OutputFormat = 'text') {
    this.path = path;
    this.format = format;
  }

  async write(report: ScanReport): Promise<void> {
    const output = this.format === 'json' ? formatJSON(report) : formatText(report);
    await writeFile(this.path, output, 'utf-8');
  }
}
