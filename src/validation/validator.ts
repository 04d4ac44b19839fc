/**
 * Static validation of generated SQL against the live schema.
 *
 * Checks run in order: single read-only statement, schema references,
 * denylisted operations, then non-fatal shape warnings. Violations are values;
 * nothing here throws.
 */

import { findColumn, findTable, tableNames } from '../schema/snapshot.js';
import type { SchemaSnapshot, TableInfo, ValidationResult, Violation } from '../types/models.js';
import { logger } from '../utils/logger.js';
import { analyzeStatement, isUnbounded, type StatementAnalysis } from './analyzer.js';
import { usesBackslashEscapes } from './scanner.js';
import { didYouMean } from './similar-names.js';
import type { Token } from './scanner.js';

/**
 * Keywords that modify data or the database itself.
 */
export const DANGEROUS_KEYWORDS: ReadonlySet<string> = new Set([
  'INSERT', 'UPDATE', 'DELETE', 'DROP', 'ALTER', 'CREATE', 'TRUNCATE', 'GRANT', 'REVOKE',
  'ATTACH', 'DETACH', 'PRAGMA', 'EXEC', 'EXECUTE', 'CALL', 'COPY', 'VACUUM', 'RENAME', 'LOCK',
]);

export class SQLValidator {
  validate(statement: string, snapshot: SchemaSnapshot): ValidationResult {
    const analysis = analyzeStatement(statement, { backslashEscapes: usesBackslashEscapes(snapshot.dialect) });
    const violations: Violation[] = [
      ...checkSyntax(analysis),
      ...checkReferences(analysis, snapshot),
      ...checkDangerous(analysis.tokens),
      ...checkShape(analysis),
    ];

    const fatal = violations.some((v) => v.fatal);
    const dangerous = violations.some((v) => v.kind === 'dangerous_operation');
    if (dangerous) {
      logger.warn(`Blocked unsafe SQL: ${violations.find((v) => v.kind === 'dangerous_operation')?.detail}`);
    }

    return {
      isValid: !fatal,
      violations,
      requiresCorrection: fatal && !dangerous,
      tablesReferenced: [...new Set(analysis.tables.map((t) => findTable(snapshot, t.name)?.name ?? t.name))],
    };
  }
}

function checkSyntax(analysis: StatementAnalysis): Violation[] {
  if (analysis.scanError) {
    return [{ kind: 'syntax_error', detail: analysis.scanError, fatal: true }];
  }
  if (analysis.tokens.length === 0) {
    return [{ kind: 'syntax_error', detail: 'Statement is empty', fatal: true }];
  }

  const violations: Violation[] = [];
  if (analysis.statementCount > 1) {
    violations.push({
      kind: 'syntax_error',
      detail: `Expected a single statement, found ${analysis.statementCount}`,
      fatal: true,
    });
  }
  if (analysis.leadingKeyword !== 'SELECT' && analysis.leadingKeyword !== 'WITH') {
    violations.push({
      kind: 'syntax_error',
      detail: `Statement must start with SELECT or WITH, found ${analysis.leadingKeyword ?? 'nothing'}`,
      fatal: true,
    });
  }
  if (!analysis.balancedParens) {
    violations.push({ kind: 'syntax_error', detail: 'Unbalanced parentheses', fatal: true });
  }
  return violations;
}

function checkReferences(analysis: StatementAnalysis, snapshot: SchemaSnapshot): Violation[] {
  if (analysis.scanError) return [];

  const violations: Violation[] = [];
  const known = tableNames(snapshot);
  const resolved = new Map<string, TableInfo>();
  let unknownTable = false;

  for (const ref of analysis.tables) {
    const table = findTable(snapshot, ref.name);
    if (!table) {
      unknownTable = true;
      violations.push({
        kind: 'unknown_table',
        detail: `Table '${ref.name}' does not exist.${didYouMean(ref.name, known)}`,
        fatal: true,
      });
      continue;
    }
    resolved.set(ref.name.toLowerCase(), table);
    if (ref.alias) resolved.set(ref.alias.toLowerCase(), table);
  }

  const reportedQualifiers = new Set<string>();
  for (const { qualifier, column } of analysis.qualifiedColumns) {
    const key = qualifier.toLowerCase();
    if (analysis.opaqueAliases.has(key) || analysis.cteNames.has(key)) continue;

    const table = resolved.get(key);
    if (!table) {
      // Unknown tables were reported above
      if (analysis.aliases.has(key) || reportedQualifiers.has(key)) continue;
      reportedQualifiers.add(key);
      violations.push({
        kind: 'unknown_table',
        detail: `Table or alias '${qualifier}' is not defined in the statement.${didYouMean(qualifier, [...analysis.aliases.keys()])}`,
        fatal: true,
      });
      continue;
    }
    if (column === '*' || findColumn(table, column)) continue;
    violations.push({
      kind: 'unknown_column',
      detail: `Column '${column}' does not exist in table '${table.name}'.${didYouMean(column, table.columns.map((c) => c.name))}`,
      fatal: true,
    });
  }

  // Bare names can only be resolved when every source is a known table
  const opaque = analysis.opaqueAliases.size > 0 || analysis.cteNames.size > 0;
  if (!opaque && !unknownTable && resolved.size > 0) {
    const tables = [...new Set(resolved.values())];
    for (const column of analysis.bareColumns) {
      if (tables.some((table) => findColumn(table, column))) continue;
      if (resolved.has(column.toLowerCase())) continue;
      const candidates = tables.flatMap((table) => table.columns.map((c) => c.name));
      violations.push({
        kind: 'unknown_column',
        detail: `Column '${column}' does not exist in ${tables.map((t) => `'${t.name}'`).join(', ')}.${didYouMean(column, candidates)}`,
        fatal: true,
      });
    }
  }

  return violations;
}

function checkDangerous(tokens: readonly Token[]): Violation[] {
  const found: string[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i];
    if (t.kind !== 'word') continue;
    const next = tokens[i + 1];

    if (DANGEROUS_KEYWORDS.has(t.upper)) {
      found.push(t.upper);
    } else if ((t.upper === 'REPLACE' || t.upper === 'MERGE') && next?.upper === 'INTO') {
      found.push(`${t.upper} INTO`);
    } else if (t.upper === 'INTO') {
      if (next?.upper === 'OUTFILE' || next?.upper === 'DUMPFILE') {
        found.push(`INTO ${next.upper}`);
      } else if (tokens.slice(0, i).some((p) => p.upper === 'SELECT')) {
        found.push('SELECT INTO');
      }
    }
  }

  return [...new Set(found)].map((keyword): Violation => ({
    kind: 'dangerous_operation',
    detail: `Statement contains ${keyword}; only read-only queries are allowed`,
    fatal: true,
  }));
}

function checkShape(analysis: StatementAnalysis): Violation[] {
  if (analysis.scanError || analysis.tokens.length === 0) return [];

  const violations: Violation[] = [];
  if (isUnbounded(analysis)) {
    violations.push({
      kind: 'missing_limit',
      detail: 'Unbounded SELECT without LIMIT may return a very large result',
      fatal: false,
    });
  }
  if (analysis.implicitJoin) {
    violations.push({
      kind: 'implicit_join',
      detail: 'Comma-separated tables in FROM; prefer explicit JOIN ... ON',
      fatal: false,
    });
  }

  const unconditioned = analysis.joinCount - analysis.crossJoins - analysis.naturalJoins - analysis.joinConditions;
  if (analysis.crossJoins > 0 || (analysis.implicitJoin && !analysis.hasWhere) || unconditioned > 0) {
    violations.push({
      kind: 'cartesian_risk',
      detail: 'Tables are combined without a join condition; the result may be a cartesian product',
      fatal: false,
    });
  }
  return violations;
}
