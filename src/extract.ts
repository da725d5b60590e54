import * as cheerio from 'cheerio';
import { ConfigurationError } from './errors.js';
import type { Extracted } from './types.js';
import { toErrorMessage } from './utils.js';

export type ExtractionConfig = {
  selectors: Record<string, string>; // name -> CSS selector
  regex: Record<string, string>; // name -> pattern, matched against the raw HTML
};

export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

/**
 * Pulls named values out of an HTML document.
 * A name with one hit maps to a string, several hits to an array, none to nothing.
 */
export class Extractor {
  private selectors: [string, string][];
  private patterns: [string, RegExp][];

  constructor(cfg: ExtractionConfig) {
    const empty = cheerio.load('');
    this.selectors = Object.entries(cfg.selectors).map(([name, selector]): [string, string] => {
      try {
        empty(selector);
      } catch (err) {
        throw new ConfigurationError(`invalid selector for "${name}": ${toErrorMessage(err)}`, `extraction.selectors.${name}`);
      }
      return [name, selector];
    });
    this.patterns = Object.entries(cfg.regex).map(([name, pattern]): [string, RegExp] => {
      try {
        return [name, new RegExp(pattern, 'g')];
      } catch (err) {
        throw new ConfigurationError(`invalid pattern for "${name}": ${toErrorMessage(err)}`, `extraction.regex.${name}`);
      }
    });
  }

  extract(html: string): Extracted {
    let $: cheerio.CheerioAPI;
    try {
      $ = cheerio.load(html);
    } catch (err) {
      throw new DecodeError(`could not parse document: ${toErrorMessage(err)}`);
    }

    const out: Extracted = {};
    for (const [name, selector] of this.selectors) {
      const values: string[] = [];
      $(selector).each((_, el) => {
        values.push($(el).text().trim());
      });
      collect(out, name, values);
    }

    for (const [name, re] of this.patterns) {
      collect(out, name, Array.from(html.matchAll(re), (m) => m[0]));
    }
    return out;
  }
}

function collect(out: Extracted, name: string, values: string[]) {
  if (values.length === 1) out[name] = values[0];
  else if (values.length > 1) out[name] = values;
}
