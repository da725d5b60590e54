import fs from 'node:fs';
import type { AppConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { toErrorMessage } from './utils.js';

export const DEFAULT_TARGETS = [
  'https://www.google.com',
  'https://www.github.com',
  'https://www.npmjs.com',
  'https://www.wikipedia.org',
  'https://www.reddit.com'
];

// One target per line; blank lines and `#` comments are skipped
export function readTargets(filePath: string): string[] {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`cannot read input file ${filePath}: ${toErrorMessage(err)}`, 'io.inputFile');
  }
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

export function resolveTargets(config: Pick<AppConfig, 'io'>): string[] {
  const { inputFile } = config.io;
  const targets = inputFile ? readTargets(inputFile) : [...DEFAULT_TARGETS];
  if (targets.length === 0) {
    throw new ConfigurationError(`no targets found in ${inputFile ?? 'defaults'}`, 'io.inputFile');
  }
  return targets;
}
