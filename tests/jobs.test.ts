import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../src/errors.js';
import { DEFAULT_TARGETS, readTargets, resolveTargets } from '../src/jobs.js';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scraper-jobs-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('readTargets', () => {
  it('reads one trimmed target per line, skipping blanks and comments', () => {
    const file = path.join(dir, 'urls.txt');
    fs.writeFileSync(file, '# seeds\nhttp://a.test\r\n\n   http://b.test  \n  # later\nhttp://c.test', 'utf-8');
    expect(readTargets(file)).toEqual(['http://a.test', 'http://b.test', 'http://c.test']);
  });

  it('fails on a missing file', () => {
    expect(() => readTargets(path.join(dir, 'nope.txt'))).toThrow(ConfigurationError);
  });
});

describe('resolveTargets', () => {
  it('uses the built-in list without an input file', () => {
    expect(resolveTargets({ io: { outputFile: 'out.json', outputFormat: 'json' } })).toEqual(DEFAULT_TARGETS);
  });

  it('rejects an input file without targets', () => {
    const file = path.join(dir, 'empty.txt');
    fs.writeFileSync(file, '# nothing yet\n\n', 'utf-8');
    expect(() => resolveTargets({ io: { inputFile: file, outputFile: 'out.json', outputFormat: 'json' } })).toThrow(
      `no targets found in ${file}`
    );
  });
});
