/**
 * Structural analysis of a single SQL statement: referenced tables, aliases,
 * column references and the shape flags the validator and post-processor use.
 */

import { scan, type ScanOptions, type Token } from './scanner.js';

export const KEYWORDS: ReadonlySet<string> = new Set([
  'SELECT', 'FROM', 'WHERE', 'AND', 'OR', 'NOT', 'IN', 'IS', 'NULL', 'LIKE', 'ILIKE', 'GLOB',
  'BETWEEN', 'EXISTS', 'AS', 'ON', 'USING', 'JOIN', 'INNER', 'LEFT', 'RIGHT', 'FULL', 'OUTER',
  'CROSS', 'NATURAL', 'LATERAL', 'GROUP', 'BY', 'ORDER', 'HAVING', 'LIMIT', 'OFFSET', 'ASC',
  'DESC', 'DISTINCT', 'ALL', 'ANY', 'SOME', 'UNION', 'INTERSECT', 'EXCEPT', 'CASE', 'WHEN',
  'THEN', 'ELSE', 'END', 'WITH', 'RECURSIVE', 'MATERIALIZED', 'TRUE', 'FALSE', 'UNKNOWN',
  'INTERVAL', 'DAY', 'DAYS', 'MONTH', 'MONTHS', 'YEAR', 'YEARS', 'WEEK', 'WEEKS', 'HOUR',
  'HOURS', 'MINUTE', 'MINUTES', 'SECOND', 'SECONDS', 'QUARTER', 'EPOCH', 'DOW', 'DOY',
  'CURRENT_DATE', 'CURRENT_TIME', 'CURRENT_TIMESTAMP', 'LOCALTIME', 'LOCALTIMESTAMP',
  'NULLS', 'FIRST', 'LAST', 'FETCH', 'NEXT', 'ROW', 'ROWS', 'ONLY', 'TOP', 'PERCENT', 'TIES',
  'OVER', 'PARTITION', 'WINDOW', 'FILTER', 'WITHIN', 'ESCAPE', 'COLLATE', 'RANGE', 'GROUPS',
  'PRECEDING', 'FOLLOWING', 'UNBOUNDED', 'CURRENT', 'DATE', 'TIME', 'TIMESTAMP', 'ZONE',
  'INTEGER', 'INT', 'BIGINT', 'SMALLINT', 'TEXT', 'VARCHAR', 'CHAR', 'NUMERIC', 'DECIMAL',
  'REAL', 'FLOAT', 'DOUBLE', 'PRECISION', 'BOOLEAN', 'SIGNED', 'UNSIGNED', 'VALUES', 'SET',
  'INTO', 'TABLE', 'SIMILAR', 'TO', 'FOR', 'OF', 'NOWAIT', 'SKIP', 'LOCKED',
  'INSERT', 'UPDATE', 'DELETE', 'DROP', 'ALTER', 'CREATE', 'TRUNCATE', 'REPLACE', 'MERGE',
  'GRANT', 'REVOKE', 'ATTACH', 'DETACH', 'PRAGMA', 'EXEC', 'EXECUTE', 'CALL', 'COPY',
  'VACUUM', 'RENAME', 'LOCK', 'OUTFILE', 'DUMPFILE', 'DATABASE', 'SCHEMA', 'INDEX', 'VIEW',
]);

export const AGGREGATE_FUNCTIONS: ReadonlySet<string> = new Set([
  'COUNT', 'SUM', 'AVG', 'MIN', 'MAX', 'GROUP_CONCAT', 'STRING_AGG', 'ARRAY_AGG', 'TOTAL',
  'STDDEV', 'VARIANCE', 'BOOL_AND', 'BOOL_OR', 'JSON_AGG', 'JSON_GROUP_ARRAY',
]);

/** Functions whose argument list contains a FROM that is not a table clause. */
const FROM_ARGUMENT_FUNCTIONS: ReadonlySet<string> = new Set(['EXTRACT', 'SUBSTRING', 'TRIM', 'POSITION', 'OVERLAY']);

const CLAUSE_END: ReadonlySet<string> = new Set([
  'WHERE', 'GROUP', 'ORDER', 'HAVING', 'LIMIT', 'OFFSET', 'UNION', 'INTERSECT', 'EXCEPT',
  'JOIN', 'INNER', 'LEFT', 'RIGHT', 'FULL', 'CROSS', 'NATURAL', 'ON', 'USING', 'FETCH',
  'WINDOW', 'FOR', 'LATERAL',
]);

export interface TableReference {
  name: string;
  alias?: string;
}

export interface ColumnReference {
  qualifier: string;
  column: string;
}

export interface StatementAnalysis {
  tokens: Token[];
  scanError?: string;
  statementCount: number;
  leadingKeyword?: string;
  balancedParens: boolean;
  /** Physical tables in FROM/JOIN (CTE references excluded). */
  tables: TableReference[];
  cteNames: Set<string>;
  /** Aliases of subqueries, table functions and CTE references (lower case). */
  opaqueAliases: Set<string>;
  /** alias or table name (lower case) → table name */
  aliases: Map<string, string>;
  qualifiedColumns: ColumnReference[];
  bareColumns: string[];
  outputAliases: Set<string>;
  /** Shape flags of the outer query; subqueries do not set them. */
  hasLimit: boolean;
  hasOffset: boolean;
  hasAggregate: boolean;
  hasGroupBy: boolean;
  hasWhere: boolean;
  joinCount: number;
  joinConditions: number;
  crossJoins: number;
  naturalJoins: number;
  implicitJoin: boolean;
}

function isIdentifier(token: Token | undefined): token is Token {
  return !!token && (token.kind === 'quoted' || (token.kind === 'word' && !KEYWORDS.has(token.upper)));
}

function isPunct(token: Token | undefined, value: string): boolean {
  return !!token && token.kind === 'punct' && token.value === value;
}

/**
 * Index of the parenthesis closing the one at `open`, or the last index.
 */
function matchingParen(tokens: readonly Token[], open: number): number {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    if (isPunct(tokens[i], '(')) depth++;
    if (isPunct(tokens[i], ')')) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return tokens.length - 1;
}

export function analyzeStatement(sql: string, options: ScanOptions = {}): StatementAnalysis {
  const scanned = scan(sql, options);
  const analysis: StatementAnalysis = {
    tokens: scanned.tokens,
    scanError: scanned.error,
    statementCount: 0,
    balancedParens: true,
    tables: [],
    cteNames: new Set(),
    opaqueAliases: new Set(),
    aliases: new Map(),
    qualifiedColumns: [],
    bareColumns: [],
    outputAliases: new Set(),
    hasLimit: false,
    hasOffset: false,
    hasAggregate: false,
    hasGroupBy: false,
    hasWhere: false,
    joinCount: 0,
    joinConditions: 0,
    crossJoins: 0,
    naturalJoins: 0,
    implicitJoin: false,
  };
  if (scanned.error) return analysis;

  const tokens = scanned.tokens.filter((t) => !isPunct(t, ';'));
  analysis.tokens = tokens;
  analysis.statementCount = countStatements(scanned.tokens);
  analysis.leadingKeyword = tokens.find((t) => !isPunct(t, '('))?.upper;

  let depth = 0;
  for (const t of tokens) {
    if (isPunct(t, '(')) depth++;
    if (isPunct(t, ')')) depth--;
    if (depth < 0) break;
  }
  analysis.balancedParens = depth === 0;

  const consumed = new Set<number>();
  collectCtes(tokens, analysis, consumed);

  // FROM inside EXTRACT(...) and friends is not a table clause
  const parenKinds: Array<'call' | 'from-argument'> = [];

  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i];
    const prev = tokens[i - 1];
    const next = tokens[i + 1];

    if (isPunct(t, '(')) {
      parenKinds.push(prev && FROM_ARGUMENT_FUNCTIONS.has(prev.upper) ? 'from-argument' : 'call');
      continue;
    }
    if (isPunct(t, ')')) {
      parenKinds.pop();
      continue;
    }
    if (t.kind !== 'word') continue;

    switch (t.upper) {
      case 'FROM':
        if (parenKinds[parenKinds.length - 1] === 'from-argument' || prev?.upper === 'DISTINCT') break;
        parseFromList(tokens, i + 1, analysis, consumed);
        break;
      case 'JOIN':
        analysis.joinCount++;
        if (prev?.upper === 'CROSS') analysis.crossJoins++;
        if (tokens.slice(Math.max(0, i - 3), i).some((p) => p.upper === 'NATURAL')) analysis.naturalJoins++;
        parseTableReference(tokens, i + 1, analysis, consumed);
        break;
      case 'ON':
      case 'USING':
        analysis.joinConditions++;
        break;
      case 'WHERE':
        analysis.hasWhere = true;
        break;
      case 'LIMIT':
      case 'TOP':
      case 'FETCH':
        if (parenKinds.length === 0) analysis.hasLimit = true;
        break;
      case 'OFFSET':
        if (parenKinds.length === 0) analysis.hasOffset = true;
        break;
      case 'GROUP':
        if (next?.upper === 'BY' && parenKinds.length === 0) analysis.hasGroupBy = true;
        break;
      case 'AS':
        if (isIdentifier(next) && !consumed.has(i + 1)) {
          analysis.outputAliases.add(next.value.toLowerCase());
          consumed.add(i + 1);
        }
        break;
      default:
        if (
          parenKinds.length === 0 &&
          AGGREGATE_FUNCTIONS.has(t.upper) &&
          isPunct(next, '(') &&
          !isWindowCall(tokens, i + 1)
        ) {
          analysis.hasAggregate = true;
        }
    }
  }

  collectColumns(tokens, analysis, consumed);
  return analysis;
}

/**
 * Whether the call whose argument list opens at `open` is a window function:
 * `f(...) OVER`, optionally with `FILTER (...)` in between.
 */
function isWindowCall(tokens: readonly Token[], open: number): boolean {
  let i = matchingParen(tokens, open) + 1;
  if (tokens[i]?.upper === 'FILTER' && isPunct(tokens[i + 1], '(')) {
    i = matchingParen(tokens, i + 1) + 1;
  }
  return tokens[i]?.upper === 'OVER';
}

function countStatements(tokens: readonly Token[]): number {
  let count = 0;
  let open = false;
  for (const t of tokens) {
    if (isPunct(t, ';')) {
      open = false;
    } else if (!open) {
      open = true;
      count++;
    }
  }
  return count;
}

function collectCtes(tokens: readonly Token[], analysis: StatementAnalysis, consumed: Set<number>): void {
  if (tokens[0]?.upper !== 'WITH') return;
  let i = tokens[1]?.upper === 'RECURSIVE' ? 2 : 1;

  while (i < tokens.length) {
    const name = tokens[i];
    if (!name || (name.kind !== 'word' && name.kind !== 'quoted')) return;
    analysis.cteNames.add(name.value.toLowerCase());
    consumed.add(i);
    i++;

    // Optional column list
    if (isPunct(tokens[i], '(')) {
      for (let j = i + 1; j < matchingParen(tokens, i); j++) consumed.add(j);
      i = matchingParen(tokens, i) + 1;
    }
    if (tokens[i]?.upper !== 'AS') return;
    i++;
    if (tokens[i]?.upper === 'NOT') i++;
    if (tokens[i]?.upper === 'MATERIALIZED') i++;
    if (!isPunct(tokens[i], '(')) return;
    i = matchingParen(tokens, i) + 1;
    if (!isPunct(tokens[i], ',')) return;
    i++;
  }
}

function parseFromList(tokens: readonly Token[], start: number, analysis: StatementAnalysis, consumed: Set<number>): void {
  let i = start;
  while (i < tokens.length) {
    i = parseTableReference(tokens, i, analysis, consumed);
    if (!isPunct(tokens[i], ',')) return;
    analysis.implicitJoin = true;
    i++;
  }
}

/**
 * Parse `name [AS alias]`, `schema.name alias`, `(subquery) alias` or
 * `func(...) alias` at `start`; returns the index after it.
 */
function parseTableReference(
  tokens: readonly Token[],
  start: number,
  analysis: StatementAnalysis,
  consumed: Set<number>
): number {
  let i = start;
  if (tokens[i]?.upper === 'LATERAL') i++;
  const first = tokens[i];
  if (!first) return i;

  let name: string | undefined;
  let opaque = false;

  if (isPunct(first, '(')) {
    opaque = true;
    i = matchingParen(tokens, i) + 1;
  } else if (first.kind === 'word' || first.kind === 'quoted') {
    const parts = [first.value];
    consumed.add(i);
    i++;
    while (isPunct(tokens[i], '.') && tokens[i + 1] && (tokens[i + 1].kind === 'word' || tokens[i + 1].kind === 'quoted')) {
      consumed.add(i + 1);
      parts.push(tokens[i + 1].value);
      i += 2;
    }
    if (isPunct(tokens[i], '(')) {
      // Table-valued function
      opaque = true;
      i = matchingParen(tokens, i) + 1;
    } else {
      name = parts[parts.length - 1];
    }
  } else {
    return i;
  }

  let alias: string | undefined;
  if (tokens[i]?.upper === 'AS' && isIdentifier(tokens[i + 1])) {
    consumed.add(i + 1);
    alias = tokens[i + 1].value;
    i += 2;
  } else if (isIdentifier(tokens[i]) && !CLAUSE_END.has(tokens[i].upper)) {
    consumed.add(i);
    alias = tokens[i].value;
    i++;
  }

  if (!name || opaque || analysis.cteNames.has(name.toLowerCase())) {
    if (alias) analysis.opaqueAliases.add(alias.toLowerCase());
    if (name) analysis.opaqueAliases.add(name.toLowerCase());
    return i;
  }

  analysis.tables.push({ name, alias });
  analysis.aliases.set(name.toLowerCase(), name);
  if (alias) analysis.aliases.set(alias.toLowerCase(), name);
  return i;
}

function collectColumns(tokens: readonly Token[], analysis: StatementAnalysis, consumed: Set<number>): void {
  // Type names after a `::` cast
  for (let i = 1; i < tokens.length; i++) {
    if (tokens[i - 1].kind === 'operator' && tokens[i - 1].value === '::' && isIdentifierToken(tokens[i])) {
      consumed.add(i);
    }
  }

  // Qualified references: a.b or s.a.b
  for (let i = 0; i < tokens.length; i++) {
    if (consumed.has(i) || !isIdentifierToken(tokens[i]) || isPunct(tokens[i - 1], '.')) continue;
    if (!isPunct(tokens[i + 1], '.')) continue;

    const parts = [tokens[i].value];
    const indices = [i];
    let j = i + 1;
    while (isPunct(tokens[j], '.') && tokens[j + 1]) {
      const part = tokens[j + 1];
      if (part.kind === 'operator' && part.value === '*') {
        parts.push('*');
      } else if (isIdentifierToken(part)) {
        parts.push(part.value);
      } else {
        break;
      }
      indices.push(j + 1);
      j += 2;
    }
    indices.forEach((index) => consumed.add(index));
    if (parts.length >= 2) {
      analysis.qualifiedColumns.push({ qualifier: parts[parts.length - 2], column: parts[parts.length - 1] });
    }
  }

  // Bare aliases: `COUNT(*) total`, `name n`, `CASE ... END label`
  for (let i = 1; i < tokens.length; i++) {
    const t = tokens[i];
    const prev = tokens[i - 1];
    if (consumed.has(i) || !isIdentifier(t) || isPunct(tokens[i + 1], '(') || isPunct(tokens[i + 1], '.')) continue;
    const afterValue =
      isPunct(prev, ')') ||
      prev.upper === 'END' ||
      prev.kind === 'string' ||
      prev.kind === 'number' ||
      (isIdentifier(prev) && !isPunct(tokens[i - 2], '.') && !consumed.has(i - 1)) ||
      (isIdentifier(prev) && consumed.has(i - 1) && isPunct(tokens[i - 2], '.'));
    if (afterValue) {
      analysis.outputAliases.add(t.value.toLowerCase());
      consumed.add(i);
    }
  }

  const seen = new Set<string>();
  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i];
    if (consumed.has(i) || !isIdentifier(t)) continue;
    if (isPunct(tokens[i + 1], '(')) continue;
    const lower = t.value.toLowerCase();
    if (analysis.outputAliases.has(lower) || seen.has(lower)) continue;
    seen.add(lower);
    analysis.bareColumns.push(t.value);
  }
}

function isIdentifierToken(token: Token | undefined): token is Token {
  return !!token && (token.kind === 'word' || token.kind === 'quoted');
}

/**
 * A plain SELECT whose row count nothing bounds: no LIMIT/TOP/FETCH, no
 * aggregate, no GROUP BY in the outer query. Subqueries and window calls do
 * not bound it.
 */
export function isUnbounded(analysis: StatementAnalysis): boolean {
  const leading = analysis.leadingKeyword;
  return (
    (leading === 'SELECT' || leading === 'WITH') &&
    !analysis.hasLimit &&
    !analysis.hasAggregate &&
    !analysis.hasGroupBy
  );
}

/**
 * Table names referenced by a statement (physical tables only), deduplicated.
 */
export function referencedTables(sql: string): string[] {
  const analysis = analyzeStatement(sql);
  return [...new Set(analysis.tables.map((t) => t.name))];
}
