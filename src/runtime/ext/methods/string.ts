/**
 * String methods. Strings are immutable: every method returns a new value,
 * and `s.upper!()` stores the result back into `s`.
 *
 * Character-class symbols (`:digits`, `:letters`, `:uppercase`, ...) drive
 * `contains`, `extract`, `count` and `find`.
 *
 * @internal
 */

import type { SourceLocation } from '../../../types.js';
import { isSymbol, isTruthy, list, type Value } from '../../core/values.js';
import {
  expectArgs,
  functionArg,
  methodError,
  positionArg,
  stringArg,
  symbolArg,
  type MethodTable,
} from './shared.js';

type CharTest = (ch: string) => boolean;

const CHAR_CLASSES: Readonly<Record<string, CharTest>> = {
  digits: (ch) => /\p{N}/u.test(ch),
  numbers: (ch) => /\p{N}/u.test(ch),
  letters: (ch) => /\p{L}/u.test(ch),
  uppercase: (ch) => /\p{Lu}/u.test(ch),
  lowercase: (ch) => /\p{Ll}/u.test(ch),
  spaces: (ch) => /\s/u.test(ch),
  whitespace: (ch) => /\s/u.test(ch),
  punctuation: (ch) => /^[!-/:-@[-`{-~]$/.test(ch),
  alphanumeric: (ch) => /[\p{L}\p{N}]/u.test(ch),
  symbols: (ch) => !/[\p{L}\p{N}\s]/u.test(ch),
};

const EMAIL = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;

function charClass(name: string): CharTest {
  return Object.hasOwn(CHAR_CLASSES, name) ? (CHAR_CLASSES[name] ?? (() => false)) : () => false;
}

/** Maximal runs of characters passing `test` */
function runs(text: string, test: CharTest): string[] {
  const found: string[] = [];
  let current = '';
  for (const ch of text) {
    if (test(ch)) {
      current += ch;
    } else if (current !== '') {
      found.push(current);
      current = '';
    }
  }
  if (current !== '') found.push(current);
  return found;
}

function extractAll(text: string, pattern: string): string[] {
  switch (pattern) {
    case 'words':
      return runs(text, charClass('letters'));
    case 'numbers':
    case 'digits':
      return runs(text, charClass('digits'));
    case 'emails':
      return text.match(EMAIL) ?? [];
    default:
      return runs(text, charClass(pattern));
  }
}

/** `slice`/`substring`: positions clamp to the string; start past end is "" */
function substring(text: string, args: Value[], method: string): string {
  const chars = [...text];
  const start = Math.min(Math.max(positionArg(method, args, 0), 0), chars.length);
  const end = Math.min(Math.max(positionArg(method, args, 1), 0), chars.length);
  return start > end ? '' : chars.slice(start, end).join('');
}

function containsClass(
  text: string,
  mode: string,
  args: Value[],
  location?: SourceLocation
): boolean {
  const tests = args.slice(1).map((arg) => {
    if (!isSymbol(arg)) {
      throw methodError('Pattern matching contains() expects symbol patterns', location);
    }
    return charClass(arg.name);
  });
  if (tests.length === 0) {
    throw methodError(
      'Pattern matching contains() requires mode and at least one pattern',
      location
    );
  }
  const chars = [...text];
  const matchesAny = (ch: string): boolean => tests.some((test) => test(ch));
  switch (mode) {
    case 'any':
      return chars.some(matchesAny);
    case 'all':
      return tests.every((test) => chars.some(test));
    case 'only':
      return chars.every(matchesAny);
    default:
      throw methodError(
        `Invalid contains() mode '${mode}'. Expected :any, :all, or :only`,
        location
      );
  }
}

export const STRING_METHODS: MethodTable<string> = {
  length: (s, args) => {
    expectArgs('length', args, 0);
    return [...s].length;
  },
  size: (s, args) => {
    expectArgs('size', args, 0);
    return [...s].length;
  },
  len: (s, args) => {
    expectArgs('len', args, 0);
    return [...s].length;
  },

  first: (s, args) => {
    expectArgs('first', args, 0);
    return [...s][0] ?? null;
  },

  last: (s, args) => {
    expectArgs('last', args, 0);
    const chars = [...s];
    return chars[chars.length - 1] ?? null;
  },

  is_empty: (s, args) => {
    expectArgs('is_empty', args, 0);
    return s.length === 0;
  },

  slice: (s, args, _host, location) => {
    expectArgs('slice', args, 2, 2, location);
    return substring(s, args, 'slice');
  },

  substring: (s, args, _host, location) => {
    expectArgs('substring', args, 2, 2, location);
    return substring(s, args, 'substring');
  },

  upper: (s, args) => {
    expectArgs('upper', args, 0);
    return s.toUpperCase();
  },

  lower: (s, args) => {
    expectArgs('lower', args, 0);
    return s.toLowerCase();
  },

  trim: (s, args) => {
    expectArgs('trim', args, 0);
    return s.trim();
  },

  reverse: (s, args) => {
    expectArgs('reverse', args, 0);
    return [...s].reverse().join('');
  },

  split: (s, args, _host, location) => {
    expectArgs('split', args, 1, 1, location);
    return list(s.split(stringArg('split', args, 0, location)));
  },

  starts_with: (s, args, _host, location) => {
    expectArgs('starts_with', args, 1, 1, location);
    return s.startsWith(stringArg('starts_with', args, 0, location));
  },

  ends_with: (s, args, _host, location) => {
    expectArgs('ends_with', args, 1, 1, location);
    return s.endsWith(stringArg('ends_with', args, 0, location));
  },

  /** `contains("sub")` or `contains(:any|:all|:only, :digits, ...)` */
  contains: (s, args, _host, location) => {
    const [first] = args;
    if (first === undefined) {
      throw methodError("Method 'contains' expects at least 1 argument", location);
    }
    if (typeof first === 'string') {
      expectArgs('contains', args, 1, 1, location);
      return s.includes(first);
    }
    if (isSymbol(first)) return containsClass(s, first.name, args, location);
    throw methodError(
      'contains() first argument must be a mode symbol (:any, :all, :only) or a substring',
      location
    );
  },

  extract: (s, args, _host, location) => {
    expectArgs('extract', args, 1, 1, location);
    return list(extractAll(s, symbolArg('extract', args, 0, location)));
  },

  /** Words and emails count as runs; other classes count characters */
  count: (s, args, _host, location) => {
    expectArgs('count', args, 1, 1, location);
    const pattern = symbolArg('count', args, 0, location);
    if (pattern === 'words' || pattern === 'emails') {
      return extractAll(s, pattern).length;
    }
    return [...s].filter(charClass(pattern)).length;
  },

  /** Positions of matching characters; `find(:c, :first)` or `find(:c, limit)` */
  find: (s, args, _host, location) => {
    expectArgs('find', args, 1, 2, location);
    const test = charClass(symbolArg('find', args, 0, location));
    const positions = [...s].flatMap((ch, i) => (test(ch) ? [i] : []));
    const [, mode] = args;
    if (mode === undefined) return list(positions);
    if (isSymbol(mode) && mode.name === 'first') return positions[0] ?? -1;
    if (typeof mode === 'number') return list(positions.slice(0, Math.max(0, mode)));
    throw methodError('find() second argument must be :first or a number limit', location);
  },

  replace: (s, args, _host, location) => {
    expectArgs('replace', args, 2, 2, location);
    return s
      .split(stringArg('replace', args, 0, location))
      .join(stringArg('replace', args, 1, location));
  },

  index_of: (s, args, _host, location) => {
    expectArgs('index_of', args, 1, 1, location);
    const at = s.indexOf(stringArg('index_of', args, 0, location));
    return at < 0 ? -1 : [...s.slice(0, at)].length;
  },

  char_code: (s, args, _host, location) => {
    expectArgs('char_code', args, 1, 1, location);
    const bytes = Buffer.from(s, 'utf8');
    const index = positionArg('char_code', args, 0);
    const byte = index >= 0 ? bytes[index] : undefined;
    if (byte === undefined) {
      throw methodError(
        `String index ${index} out of bounds for string of length ${bytes.length}`,
        location
      );
    }
    return byte;
  },

  map: (s, args, host, location) => {
    expectArgs('map', args, 1, 1, location);
    const fn = functionArg('map', args, 0, location);
    return list([...s].map((ch) => host.callFunction(fn, [ch])));
  },

  filter: (s, args, host, location) => {
    expectArgs('filter', args, 1, 1, location);
    const fn = functionArg('filter', args, 0, location);
    return [...s].filter((ch) => isTruthy(host.callFunction(fn, [ch]))).join('');
  },

  reject: (s, args, host, location) => {
    expectArgs('reject', args, 1, 1, location);
    const fn = functionArg('reject', args, 0, location);
    return [...s].filter((ch) => !isTruthy(host.callFunction(fn, [ch]))).join('');
  },

  each: (s, args, host, location) => {
    expectArgs('each', args, 1, 1, location);
    const fn = functionArg('each', args, 0, location);
    for (const ch of s) host.callFunction(fn, [ch]);
    return s;
  },
};
