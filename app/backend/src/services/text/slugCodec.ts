// Characters that cannot appear literally in a path segment, and their escapes.
const ESCAPES: ReadonlyArray<[string, string]> = [
  ['?', '~q'],
  ['&', '~a'],
  ['%', '~p'],
  ['#', '~h'],
  ['/', '~s'],
  ['\\', '~b'],
  ['<', '~l'],
  ['>', '~g'],
  ['"', "''"],
  ['\n', '~n'],
];

const UNESCAPES = new Map(ESCAPES.map(([char, escape]) => [escape, char]));

// Escapes that `normalize` applies to literal characters left in a slug.
// `/` is excluded because it separates lines.
const NORMALIZE = new Map(ESCAPES.filter(([char]) => char !== '/'));

export const BLANK_LINE = '_';

export interface NormalizedSlug {
  slug: string;
  updated: boolean;
}

const encodeLine = (line: string): string => {
  if (!line) {
    return BLANK_LINE;
  }
  let encoded = '';
  for (const char of line) {
    if (char === '_') encoded += '__';
    else if (char === '-') encoded += '--';
    else if (char === ' ') encoded += '_';
    else encoded += ESCAPES.find(([raw]) => raw === char)?.[1] ?? char;
  }
  return encoded;
};

const decodeLine = (segment: string): string => {
  if (segment === BLANK_LINE) {
    return '';
  }
  let decoded = '';
  let i = 0;
  while (i < segment.length) {
    const pair = segment.slice(i, i + 2);
    if (pair === '__' || pair === '--') {
      decoded += pair[0];
      i += 2;
      continue;
    }
    const unescaped = UNESCAPES.get(pair);
    if (unescaped !== undefined) {
      decoded += unescaped;
      i += 2;
      continue;
    }
    const char = segment[i];
    decoded += char === '_' || char === '-' ? ' ' : char;
    i += 1;
  }
  return decoded;
};

/** Encodes text lines into a slug: one path segment per line. */
export const encode = (lines: readonly string[]): string =>
  lines.length ? lines.map(encodeLine).join('/') : BLANK_LINE;

/** Decodes a slug into its text lines. An empty slug has no lines. */
export const decode = (slug: string): string[] =>
  slug ? slug.split('/').map(decodeLine) : [];

/**
 * Rewrites a slug into its canonical form: literal spaces become `_`,
 * characters with an escape are escaped, and empty segments become blank
 * lines. Canonical slugs come back unchanged.
 */
export const normalize = (slug: string): NormalizedSlug => {
  const normalized = slug
    .split('/')
    .map((segment) => {
      if (!segment) {
        return BLANK_LINE;
      }
      let result = '';
      for (const char of segment) {
        result += char === ' ' ? '_' : NORMALIZE.get(char) ?? char;
      }
      return result;
    })
    .join('/');
  return { slug: normalized, updated: normalized !== slug };
};

export interface SlugCodec {
  encode(lines: readonly string[]): string;
  decode(slug: string): string[];
  normalize(slug: string): NormalizedSlug;
}

export const slugCodec: SlugCodec = { encode, decode, normalize };
