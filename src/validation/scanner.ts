/**
 * Minimal SQL tokenizer: enough structure to find keywords, identifiers and
 * clause boundaries without being fooled by string literals or comments.
 */

export type TokenKind = 'word' | 'quoted' | 'string' | 'number' | 'punct' | 'operator' | 'param';

export interface Token {
  kind: TokenKind;
  /** Source text (identifier text without quotes for `quoted`). */
  value: string;
  /** Upper-cased value, for keyword comparison. */
  upper: string;
  start: number;
  end: number;
}

export interface ScanResult {
  tokens: Token[];
  error?: string;
}

export interface ScanOptions {
  /** Backslash escapes inside '...' literals (MySQL). Standard SQL has none. */
  backslashEscapes?: boolean;
}

/**
 * Whether a dialect (Knex client or display name) treats backslash as an
 * escape inside string literals.
 */
export function usesBackslashEscapes(dialect: string | undefined): boolean {
  return /mysql|maria/i.test(dialect ?? '');
}

const IDENT_START = /[\p{L}_]/u;
const IDENT_PART = /[\p{L}\p{N}_$]/u;

function token(kind: TokenKind, value: string, start: number, end: number): Token {
  return { kind, value, upper: value.toUpperCase(), start, end };
}

export function scan(sql: string, options: ScanOptions = {}): ScanResult {
  const tokens: Token[] = [];
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    // -- line comment
    if (ch === '-' && sql[i + 1] === '-') {
      const newline = sql.indexOf('\n', i);
      i = newline === -1 ? sql.length : newline + 1;
      continue;
    }

    /* block comment */
    if (ch === '/' && sql[i + 1] === '*') {
      const close = sql.indexOf('*/', i + 2);
      if (close === -1) return { tokens, error: 'Unterminated block comment' };
      i = close + 2;
      continue;
    }

    if (ch === "'") {
      const end = closeQuote(sql, i, "'", options.backslashEscapes ?? false);
      if (end === -1) return { tokens, error: 'Unterminated string literal' };
      tokens.push(token('string', sql.slice(i, end + 1), i, end + 1));
      i = end + 1;
      continue;
    }

    if (ch === '"' || ch === '`' || ch === '[') {
      const closing = ch === '[' ? ']' : ch;
      const end = closeQuote(sql, i, closing, false);
      if (end === -1) return { tokens, error: 'Unterminated quoted identifier' };
      const inner = sql.slice(i + 1, end).split(closing + closing).join(closing);
      tokens.push(token('quoted', inner, i, end + 1));
      i = end + 1;
      continue;
    }

    if (/[0-9]/.test(ch) || (ch === '.' && /[0-9]/.test(sql[i + 1] ?? ''))) {
      let j = i + 1;
      while (j < sql.length && /[0-9.eE]/.test(sql[j])) j++;
      tokens.push(token('number', sql.slice(i, j), i, j));
      i = j;
      continue;
    }

    // E'...' escape string (PostgreSQL)
    if ((ch === 'E' || ch === 'e') && sql[i + 1] === "'" && !IDENT_PART.test(sql[i - 1] ?? '')) {
      const end = closeQuote(sql, i + 1, "'", true);
      if (end === -1) return { tokens, error: 'Unterminated string literal' };
      tokens.push(token('string', sql.slice(i, end + 1), i, end + 1));
      i = end + 1;
      continue;
    }

    if (IDENT_START.test(ch)) {
      let j = i + 1;
      while (j < sql.length && IDENT_PART.test(sql[j])) j++;
      tokens.push(token('word', sql.slice(i, j), i, j));
      i = j;
      continue;
    }

    if ((ch === '?' || ch === '$' || ch === ':') && /[0-9A-Za-z_]/.test(sql[i + 1] ?? '') && sql[i - 1] !== ':') {
      let j = i + 1;
      while (j < sql.length && /[0-9A-Za-z_]/.test(sql[j])) j++;
      tokens.push(token('param', sql.slice(i, j), i, j));
      i = j;
      continue;
    }

    if ('(),;.'.includes(ch)) {
      tokens.push(token('punct', ch, i, i + 1));
      i++;
      continue;
    }

    // Multi-character operators first
    const two = sql.slice(i, i + 2);
    if (['<=', '>=', '<>', '!=', '||', '::', '->'].includes(two)) {
      const three = sql.slice(i, i + 3);
      const value = three === '->>' ? three : two;
      tokens.push(token('operator', value, i, i + value.length));
      i += value.length;
      continue;
    }

    tokens.push(token('operator', ch, i, i + 1));
    i++;
  }

  return { tokens };
}

/**
 * Index of the closing quote, honouring doubled quotes as escapes.
 */
function closeQuote(sql: string, open: number, quote: string, backslashEscapes: boolean): number {
  let i = open + 1;
  while (i < sql.length) {
    if (sql[i] === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i;
    }
    if (backslashEscapes && sql[i] === '\\' && i + 1 < sql.length) {
      i += 2;
      continue;
    }
    i++;
  }
  return -1;
}

/**
 * Rebuild SQL from the source with comments dropped and whitespace outside
 * literals collapsed to single spaces.
 */
export function compact(sql: string, tokens: readonly Token[]): string {
  let out = '';
  let previous: Token | undefined;
  for (const current of tokens) {
    // Adjacent tokens stay adjacent (`t.col`, `count(*)`); any gap becomes one space
    if (previous && previous.end !== current.start) out += ' ';
    out += sql.slice(current.start, current.end);
    previous = current;
  }
  return out;
}
