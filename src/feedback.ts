/**
 * Turns validation violations and database errors into correction context for
 * the next generation attempt.
 */

import { findTable, tableNames } from './schema/snapshot.js';
import type { SchemaSnapshot, Violation } from './types/models.js';
import { referencedTables } from './validation/analyzer.js';
import { findSimilarNames } from './validation/similar-names.js';

export type ExecutionErrorType =
  | 'table_not_found'
  | 'column_not_found'
  | 'ambiguous_column'
  | 'syntax'
  | 'type_mismatch'
  | 'timeout'
  | 'permission'
  | 'connection'
  | 'unknown';

export interface ErrorAnalysis {
  type: ExecutionErrorType;
  message: string;
  /** Table or column named by the error, when one could be extracted. */
  element?: string;
  suggestion: string;
}

interface ErrorPattern {
  type: ExecutionErrorType;
  patterns: RegExp[];
}

// sqlite, postgres, mysql and mssql phrasing
const ERROR_PATTERNS: ErrorPattern[] = [
  {
    type: 'table_not_found',
    patterns: [
      /no such table: ([\w.]+)/i,
      /relation "([^"]+)" does not exist/i,
      /Table '([^']+)' doesn't exist/i,
      /Unknown table '([^']+)'/i,
      /Invalid object name '([^']+)'/i,
    ],
  },
  {
    type: 'column_not_found',
    patterns: [
      /no such column: ([\w.]+)/i,
      /column "([^"]+)" does not exist/i,
      /column ([\w.]+) does not exist/i,
      /Unknown column '([^']+)'/i,
      /Invalid column name '([^']+)'/i,
    ],
  },
  {
    type: 'ambiguous_column',
    patterns: [
      /ambiguous column name: ([\w.]+)/i,
      /column reference "([^"]+)" is ambiguous/i,
      /Column '([^']+)' in .+ is ambiguous/i,
      /Ambiguous column name '([^']+)'/i,
    ],
  },
  {
    type: 'syntax',
    patterns: [
      /near "([^"]+)": syntax error/i,
      /syntax error at or near "([^"]+)"/i,
      /You have an error in your SQL syntax/i,
      /Incorrect syntax near '([^']+)'/i,
      /syntax error/i,
    ],
  },
  {
    type: 'type_mismatch',
    patterns: [
      /invalid input syntax for type/i,
      /Incorrect (?:date|datetime|integer|decimal|double) value/i,
      /operator does not exist/i,
      /cannot cast/i,
      /datatype mismatch/i,
      /Conversion failed/i,
    ],
  },
  {
    type: 'timeout',
    patterns: [/statement timeout/i, /canceling statement due to/i, /Query execution was interrupted/i, /timed? ?out/i],
  },
  {
    type: 'permission',
    patterns: [/permission denied/i, /access denied/i, /not authorized/i, /attempt to write a readonly database/i, /command denied/i],
  },
  {
    type: 'connection',
    patterns: [/ECONNREFUSED/, /ECONNRESET/, /ENOTFOUND/, /connection (?:refused|terminated|lost|closed)/i, /unable to open database/i],
  },
];

const NON_RETRYABLE: ReadonlySet<ExecutionErrorType> = new Set(['permission', 'connection']);

/**
 * Classify a database error message and suggest a fix using the schema.
 */
export function analyzeExecutionError(message: string, statement: string, snapshot?: SchemaSnapshot): ErrorAnalysis {
  for (const { type, patterns } of ERROR_PATTERNS) {
    for (const pattern of patterns) {
      const match = pattern.exec(message);
      if (!match) continue;
      const element = match[1];
      return { type, message, element, suggestion: suggestFix(type, element, statement, snapshot) };
    }
  }
  return { type: 'unknown', message, suggestion: 'Review the query syntax and the schema' };
}

/**
 * Permission and connection failures will not change with a different
 * statement.
 */
export function isRetryable(analysis: ErrorAnalysis): boolean {
  return !NON_RETRYABLE.has(analysis.type);
}

function suggestFix(type: ExecutionErrorType, element: string | undefined, statement: string, snapshot?: SchemaSnapshot): string {
  switch (type) {
    case 'table_not_found': {
      if (!element || !snapshot) return 'Use only tables listed in the schema';
      const name = element.split('.').pop() ?? element;
      const similar = findSimilarNames(name, tableNames(snapshot));
      return similar.length > 0
        ? `Did you mean: ${similar.join(', ')}?`
        : `Available tables: ${tableNames(snapshot).slice(0, 10).join(', ')}`;
    }
    case 'column_not_found': {
      if (!element || !snapshot) return 'Use only columns listed in the schema';
      const column = element.split('.').pop() ?? element;
      const tables = referencedTables(statement).flatMap((name) => {
        const table = findTable(snapshot, name);
        return table ? [table] : [];
      });
      const columns = tables.flatMap((table) => table.columns.map((c) => c.name));
      const similar = findSimilarNames(column, columns);
      if (similar.length > 0) return `Did you mean: ${similar.join(', ')}?`;
      const first = tables[0];
      return first
        ? `Columns in ${first.name}: ${first.columns.slice(0, 10).map((c) => c.name).join(', ')}`
        : 'Use only columns listed in the schema';
    }
    case 'ambiguous_column':
      return `Qualify '${element ?? 'the column'}' with a table alias (e.g. t.${element ?? 'column'})`;
    case 'syntax':
      return 'Check SQL syntax, keyword order and parenthesization of set operations';
    case 'type_mismatch':
      return 'Check data types and cast or format values to match the column type';
    case 'timeout':
      return 'Narrow the query with filters or a smaller LIMIT';
    case 'permission':
      return 'The database user is not allowed to run this query';
    case 'connection':
      return 'The database is unreachable';
    case 'unknown':
      return 'Review the query syntax and the schema';
  }
}

/**
 * Correction context for a statement rejected by the validator.
 */
export function buildValidationCorrection(statement: string, violations: readonly Violation[]): string {
  const fatal = violations.filter((v) => v.fatal);
  return [
    'The previous SQL query failed validation. Fix it.',
    '',
    'Failed SQL:',
    '```sql',
    statement,
    '```',
    '',
    'Problems:',
    ...fatal.map((v) => `- [${v.kind}] ${v.detail}`),
    '',
    'Return a corrected read-only query that keeps the original intent.',
  ].join('\n');
}

/**
 * Correction context for a statement the database rejected.
 */
export function buildExecutionCorrection(statement: string, analysis: ErrorAnalysis): string {
  const lines = [
    'The previous SQL query failed when executed. Fix it.',
    '',
    'Failed SQL:',
    '```sql',
    statement,
    '```',
    '',
    `Error type: ${analysis.type}`,
    `Error message: ${analysis.message}`,
  ];
  if (analysis.element) lines.push(`Problematic element: ${analysis.element}`);
  lines.push(`Suggestion: ${analysis.suggestion}`, '', 'Return a corrected read-only query that keeps the original intent.');
  return lines.join('\n');
}
