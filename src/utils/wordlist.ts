/**
 * Wordlist file loading
 */

import { readFile } from 'fs/promises';
import { InvalidConfigError } from '../core/errors.js';
import { logger } from './logger.js';

/**
 * Split wordlist text into labels: trimmed, lowercased, without blank or
 * `#` comment lines, de-duplicated in first-seen order
 */
export function parseWordlist(content: string): string[] {
  const seen = new Set<string>();

  for (const line of content.split(/\r?\n/)) {
    const word = line.trim().toLowerCase();
    if (!word || word.startsWith('#')) continue;
    seen.add(word);
  }

  return Array.from(seen);
}

/**
 * Load labels from a wordlist file
 * @throws InvalidConfigError when the file cannot be read
 */
export async function loadWordlist(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const reason =
      error instanceof Error && 'code' in error && error.code === 'ENOENT'
        ? 'file not found'
        : error instanceof Error
          ? error.message
          : String(error);
    throw new InvalidConfigError('wordlist', `Cannot read wordlist '${path}': ${reason}`, {
      cause: error,
    });
  }

  const words = parseWordlist(content);
  logger.info(`Loaded ${words.length} words from wordlist`);
  return words;
}
