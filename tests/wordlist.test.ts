/**
 * Tests for wordlist loading
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadWordlist, parseWordlist } from '../src/utils/wordlist.js';
import { InvalidConfigError } from '../src/core/errors.js';
import { logger } from '../src/utils/logger.js';

describe('parseWordlist', () => {
  it('should trim, lowercase and drop blank and comment lines', () => {
    const content = '# common names\nwww\n  Mail  \n\n   \napi\r\n#dev\n';

    expect(parseWordlist(content)).toEqual(['www', 'mail', 'api']);
  });

  it('should keep the first occurrence of duplicates', () => {
    expect(parseWordlist('www\nmail\nWWW\nmail\nftp')).toEqual(['www', 'mail', 'ftp']);
  });

  it('should return an empty list for an empty file', () => {
    expect(parseWordlist('')).toEqual([]);
  });
});

describe('loadWordlist', () => {
  let dir: string;

  beforeAll(async () => {
    logger.setQuiet(true);
    dir = await mkdtemp(join(tmpdir(), 'dnsweep-wordlist-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load labels from a file', async () => {
    const path = join(dir, 'words.txt');
    await writeFile(path, 'www\nmail\n\nvpn\n', 'utf-8');

    await expect(loadWordlist(path)).resolves.toEqual(['www', 'mail', 'vpn']);
  });

  it('should raise InvalidConfigError for a missing file', async () => {
    const path = join(dir, 'missing.txt');

    const error = await loadWordlist(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvalidConfigError);
    expect(error).toMatchObject({
      field: 'wordlist',
      message: `Cannot read wordlist '${path}': file not found`,
    });
  });
});
