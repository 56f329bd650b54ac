/**
 * Progress reporters for terminal output
 */

import ora, { type Ora } from 'ora';
import { logger } from './logger.js';
import type { ProgressReporter, ScanSnapshot } from '../core/types.js';

/**
 * Text progress bar, e.g. `██████░░░░`
 */
export function renderBar(completed: number, total: number, width = 30): string {
  const ratio = total > 0 ? Math.min(completed / total, 1) : 1;
  const filled = Math.round(ratio * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

export function formatProgress(snapshot: ScanSnapshot, width = 30): string {
  const { completed, total, resolved } = snapshot;
  const percentage = total > 0 ? Math.round((completed / total) * 100) : 100;
  return (
    `Scanning subdomains ${renderBar(completed, total, width)} ` +
    `${String(percentage).padStart(3)}% (${completed}/${total}) • ${resolved} resolved`
  );
}

export interface LineWriter {
  /** Print a line without corrupting the progress display */
  log(line: string): void;
}

/**
 * Animated spinner with a progress bar, for interactive terminals
 */
export class SpinnerProgressReporter implements ProgressReporter, LineWriter {
  private spinner: Ora;

  constructor(stream: NodeJS.WritableStream = process.stderr) {
    this.spinner = ora({ stream, discardStdin: false });
  }

  start(total: number): void {
    this.spinner.start(
      formatProgress({
        completed: 0,
        total,
        resolved: 0,
        inFlight: 0,
        failures: { NameNotFound: 0, Timeout: 0, NetworkError: 0, Other: 0 },
      })
    );
  }

  update(snapshot: ScanSnapshot): void {
    this.spinner.text = formatProgress(snapshot);
  }

  stop(snapshot: ScanSnapshot, cancelled: boolean): void {
    const text = formatProgress(snapshot);
    if (cancelled) {
      this.spinner.warn(`${text} (cancelled)`);
    } else {
      this.spinner.succeed(text);
    }
  }

  log(line: string): void {
    if (this.spinner.isSpinning) {
      this.spinner.clear();
      console.log(line);
      this.spinner.render();
    } else {
      console.log(line);
    }
  }
}

/**
 * Plain log lines through the logger, for pipes and CI logs.
 * Only changed counts are logged.
 */
export class LogProgressReporter implements ProgressReporter, LineWriter {
  private lastCompleted = -1;

  start(total: number): void {
    logger.info(`Resolving ${total} candidates...`);
  }

  update(snapshot: ScanSnapshot): void {
    if (snapshot.completed === this.lastCompleted) return;
    this.lastCompleted = snapshot.completed;
    logger.progress(`${snapshot.resolved} resolved`, snapshot.completed, snapshot.total);
  }

  stop(snapshot: ScanSnapshot, cancelled: boolean): void {
    const summary = `${snapshot.resolved} of ${snapshot.completed}/${snapshot.total} names resolved`;
    if (cancelled) {
      logger.warn(`Scan cancelled: ${summary}`);
    } else {
      logger.success(`Scan finished: ${summary}`);
    }
  }

  log(line: string): void {
    console.log(line);
  }
}
