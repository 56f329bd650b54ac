/**
 * Tests for the command-line program
 */

import { describe, it, expect } from 'vitest';
import { CommanderError } from 'commander';
import { USAGE_EXAMPLES, createProgram } from '../src/cli/program.js';
import { VERSION } from '../src/index.js';

function helpOutput(): string {
  let out = '';
  const program = createProgram().configureOutput({
    writeOut: (str) => {
      out += str;
    },
  });
  program.outputHelp();
  return out;
}

describe('createProgram', () => {
  it('should open the help with the name and version', () => {
    const help = helpOutput();

    expect(help).toContain('dnsweep');
    expect(help).toContain(VERSION);
    expect(help).toContain('resolve wordlist subdomains under a concurrency cap');
  });

  it('should list every usage example after the options', () => {
    const help = helpOutput();
    const examplesAt = help.indexOf('Examples:');

    expect(examplesAt).toBeGreaterThan(help.indexOf('Commands:'));
    for (const [command, note] of USAGE_EXAMPLES) {
      expect(help.slice(examplesAt)).toContain(command);
      expect(help.slice(examplesAt)).toContain(`# ${note}`);
    }
  });

  it('should register the scan command', () => {
    expect(createProgram().commands.map((c) => c.name())).toEqual(['scan']);
  });

  it('should report the version through an exit error instead of exiting', async () => {
    let out = '';
    const program = createProgram().configureOutput({
      writeOut: (str) => {
        out += str;
      },
    });

    const error = await program.parseAsync(['node', 'dnsweep', '--version']).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommanderError);
    expect(error).toMatchObject({ exitCode: 0 });
    expect(out).toBe(`${VERSION}\n`);
  });
});
