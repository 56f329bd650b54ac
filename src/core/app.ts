/**
 * Main application orchestrator
 */
import chalk from 'chalk';
import { ScanController } from './controller.js';
import { InvalidConfigError } from './errors.js';
import { DnsResolver } from './resolver.js';
import { logger } from '../utils/logger.js';
import { FileOutputSink } from '../utils/output.js';
import {
  LogProgressReporter,
  SpinnerProgressReporter,
  type LineWriter,
} from '../utils/progress.js';
import { loadWordlist } from '../utils/wordlist.js';
import type { AppConfig, ProgressReporter, RecordedOutcome, ScanReport } from './types.js';

/**
 * Main application class that wires the CLI collaborators around a scan
 */
export class App {
  private config: AppConfig;
  private controller?: ScanController;

  constructor(config: AppConfig) {
    this.config = config;

    // Configure logger
    logger.setQuiet(config.quiet);
    logger.setLevel(config.verbose ? 'debug' : 'info');
    logger.setLogFile(config.logFile);
  }

  /**
   * Cancel the running scan; partial results are still written
   */
  cancel(): boolean {
    return this.controller?.cancel() ?? false;
  }

  /**
   * Load the wordlist, run the scan and persist the results
   */
  async run(): Promise<ScanReport> {
    try {
      const words = await loadWordlist(this.config.wordlist);
      if (words.length === 0) {
        throw new InvalidConfigError('wordlist', `No words found in wordlist '${this.config.wordlist}'`);
      }

      const reporter = this.createReporter();
      const writer: LineWriter = reporter ?? { log: (line) => console.log(line) };

      this.controller = new ScanController(
        {
          domain: this.config.domain,
          wordlistSource: words,
          concurrency: this.config.concurrency,
          timeoutPerLookup: this.config.timeout,
          retries: this.config.retries,
          outputSink: this.config.output
            ? new FileOutputSink(this.config.output, this.config.format)
            : undefined,
        },
        {
          resolver: new DnsResolver({ servers: this.config.resolvers }),
          reporter,
          onOutcome: (outcome) => this.printOutcome(outcome, writer),
        }
      );

      const report = await this.controller.run();

      if (this.config.output) {
        logger.success(`Results saved to: ${this.config.output}`);
      }

      return report;
    } catch (error) {
      logger.error('Scan failed:', error);
      throw error;
    }
  }

  private createReporter(): (ProgressReporter & LineWriter) | undefined {
    if (this.config.quiet || !this.config.progress) {
      return undefined;
    }
    return process.stderr.isTTY ? new SpinnerProgressReporter() : new LogProgressReporter();
  }

  /**
   * Print resolved names as they are found
   */
  private printOutcome(outcome: RecordedOutcome, writer: LineWriter): void {
    if (outcome.status !== 'resolved' || this.config.quiet) {
      return;
    }

    writer.log(
      `${chalk.green(outcome.candidate.hostname)} -> ${chalk.cyan(outcome.addresses.join(', '))} ` +
        chalk.yellow(`(${(outcome.duration / 1000).toFixed(2)}s)`)
    );
  }
}
