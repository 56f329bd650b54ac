/**
 * dnsweep command-line program
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { scanCommand } from './commands/scan.js';
import { VERSION } from '../index.js';

export const USAGE_EXAMPLES: ReadonlyArray<readonly [string, string]> = [
  ['dnsweep scan -d example.com -w words.txt', 'resolve <word>.example.com for every word'],
  ['dnsweep scan -d example.com -w words.txt -c 200 -t 1500', 'more workers, shorter timeout'],
  ['dnsweep scan -d example.com -w words.txt -r 1.1.1.1,9.9.9.9', 'query specific nameservers'],
  ['dnsweep scan -d example.com -w words.txt -o found.json -f json', 'save the report as JSON'],
];

export function headerLine(): string {
  return `${chalk.bold('dnsweep')} ${chalk.dim(VERSION)} ${chalk.dim('·')} resolve wordlist subdomains under a concurrency cap\n`;
}

function examplesText(): string {
  const width = Math.max(...USAGE_EXAMPLES.map(([command]) => command.length));
  const lines = USAGE_EXAMPLES.map(
    ([command, note]) => `  ${chalk.cyan(command.padEnd(width))}  ${chalk.dim(`# ${note}`)}`
  );
  return `\nExamples:\n${lines.join('\n')}\n\nCtrl+C once stops dispatching and keeps what resolved; twice exits at once.\n`;
}

export function createProgram(): Command {
  return new Command()
    .name('dnsweep')
    .description('Wordlist-driven subdomain resolver with bounded concurrency')
    .version(VERSION, '-V, --version')
    .addHelpText('beforeAll', headerLine())
    .addHelpText('after', examplesText())
    .addCommand(scanCommand)
    .exitOverride();
}
