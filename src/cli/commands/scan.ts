/**
 * Scan command implementation
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { App } from '../../core/app.js';
import { DEFAULT_CONCURRENCY, DEFAULT_RETRIES, DEFAULT_TIMEOUT } from '../../core/config.js';
import type { AppConfig } from '../../core/types.js';

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

export const scanCommand = new Command('scan')
  .description('Resolve wordlist-generated subdomains of a domain')
  .requiredOption('-d, --domain <domain>', 'Target domain to scan')
  .requiredOption('-w, --wordlist <file>', 'Wordlist file, one label per line')
  .option('-c, --concurrency <number>', 'Concurrent DNS lookups', parsePositiveInt, DEFAULT_CONCURRENCY)
  .option('-t, --timeout <ms>', 'Timeout per lookup in milliseconds', parsePositiveInt, DEFAULT_TIMEOUT)
  .option('--retries <number>', 'Retries after a timeout or network error', parseNonNegativeInt, DEFAULT_RETRIES)
  .option('-r, --resolvers <servers>', 'Comma-separated nameservers (default: system)', parseList, [])
  .option('-o, --output <file>', 'File to save the results')
  .option('-f, --format <type>', 'Output file format: text|json', 'text')
  .option('--log-file <file>', 'Append warnings and errors to a file')
  .option('--no-progress', 'Disable the progress display')
  .option('-q, --quiet', 'Suppress output', false)
  .option('-v, --verbose', 'Enable debug logging', false)
  .action(
    async (options: {
      domain: string;
      wordlist: string;
      concurrency: number;
      timeout: number;
      retries: number;
      resolvers: string[];
      output?: string;
      format: string;
      logFile?: string;
      progress: boolean;
      quiet: boolean;
      verbose: boolean;
    }) => {
      try {
        const format = options.format;
        if (format !== 'text' && format !== 'json') {
          throw new Error(`Invalid format: ${format}. Use text or json.`);
        }

        const config: AppConfig = {
          domain: options.domain,
          wordlist: options.wordlist,
          concurrency: options.concurrency,
          timeout: options.timeout,
          retries: options.retries,
          resolvers: options.resolvers,
          output: options.output,
          format,
          logFile: options.logFile,
          progress: options.progress,
          quiet: options.quiet,
          verbose: options.verbose,
        };

        if (!config.quiet) {
          console.log(chalk.bold('\n   Target') + chalk.gray(' ──▶ ') + chalk.cyan.bold(config.domain));
          console.log(chalk.gray('   ├─ Wordlist     : ') + chalk.white(config.wordlist));
          console.log(chalk.gray('   ├─ Concurrency  : ') + chalk.white.bold(config.concurrency.toString()));
          console.log(chalk.gray('   ├─ Timeout      : ') + chalk.white(`${config.timeout}ms`));
          console.log(
            chalk.gray('   ├─ Nameservers  : ') +
              (config.resolvers.length > 0 ? chalk.white(config.resolvers.join(', ')) : chalk.dim('System'))
          );
          console.log(
            chalk.gray('   └─ Output File  : ') +
              (config.output ? chalk.blue(config.output) : chalk.dim('None')) +
              '\n'
          );
        }

        const app = new App(config);

        // First Ctrl+C drains in-flight lookups, a second one exits immediately
        const onSignal = () => {
          if (!app.cancel()) {
            process.exit(130);
          }
          if (!config.quiet) {
            console.log(chalk.red.bold('\n   Scan interrupted by user, finishing in-flight lookups...'));
          }
        };
        process.on('SIGINT', onSignal);

        const results = await app.run().finally(() => process.off('SIGINT', onSignal));

        if (!config.quiet) {
          const { snapshot } = results;
          console.log(
            (results.cancelled
              ? chalk.yellow.bold('\n   ⚠ Scan cancelled\n')
              : chalk.green.bold('\n   ✔ Scan completed successfully!\n')) +
              chalk.gray('   ──────────────────────────────────────────────────────────────\n')
          );
          console.log(chalk.bold('   Results Summary'));
          console.log(
            chalk.gray('   ├─ Candidates checked : ') +
              chalk.white.bold(`${snapshot.completed}/${snapshot.total}`)
          );
          console.log(
            chalk.gray('   ├─ Resolved           : ') + chalk.green.bold(snapshot.resolved.toString())
          );
          console.log(
            chalk.gray('   ├─ Timeouts / errors  : ') +
              chalk.yellow(
                `${snapshot.failures.Timeout} / ${snapshot.failures.NetworkError + snapshot.failures.Other}`
              )
          );
          console.log(
            chalk.gray('   └─ Duration           : ') +
              chalk.white(`${(results.metadata.duration / 1000).toFixed(2)}s\n`)
          );
        }

        process.exit(results.cancelled ? 130 : 0);
      } catch (error) {
        if (error instanceof Error) {
          console.log(chalk.red.bold('\n   ✘ Scan failed\n'));
          console.log(chalk.red(`   Error: `) + chalk.white(error.message));
          console.log(chalk.dim('\n   Check your input arguments or network connectivity.\n'));
        }
        process.exit(1);
      }
    }
  );
