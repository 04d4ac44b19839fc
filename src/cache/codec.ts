/**
 * JSON encoding of cached payloads.
 */

import { createHash } from 'crypto';
import type { CompactSchemaContext, JoinHint, SQLCandidate } from '../types/models.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types/utils.js';

export function hashKey(text: string): string {
  return createHash('sha256').update(text).digest('hex').substring(0, 16);
}

export function encodeCandidate(candidate: SQLCandidate): JsonObject {
  return {
    statement: candidate.statement,
    explanation: candidate.explanation,
    confidence: candidate.confidence,
    tablesReferenced: [...candidate.tablesReferenced],
  };
}

export function decodeCandidate(value: JsonValue | undefined): SQLCandidate | undefined {
  if (!isJsonObject(value)) return undefined;
  const { statement, explanation, confidence, tablesReferenced } = value;
  if (typeof statement !== 'string' || typeof explanation !== 'string' || typeof confidence !== 'number') {
    return undefined;
  }
  return {
    statement,
    explanation,
    confidence,
    tablesReferenced: Array.isArray(tablesReferenced)
      ? tablesReferenced.filter((t): t is string => typeof t === 'string')
      : [],
  };
}

export function readString(value: JsonObject, field: string): string | undefined {
  const raw = value[field];
  return typeof raw === 'string' ? raw : undefined;
}

export function encodeContext(context: CompactSchemaContext): JsonObject {
  return {
    relevantTables: [...context.relevantTables],
    renderedText: context.renderedText,
    joinHints: context.joinHints.map((hint) => ({
      fromTable: hint.fromTable,
      fromColumn: hint.fromColumn,
      toTable: hint.toTable,
      toColumn: hint.toColumn,
    })),
  };
}

export function decodeContext(value: JsonValue | undefined): CompactSchemaContext | undefined {
  if (!isJsonObject(value)) return undefined;
  const { relevantTables, renderedText, joinHints } = value;
  if (typeof renderedText !== 'string' || !Array.isArray(relevantTables) || !Array.isArray(joinHints)) {
    return undefined;
  }

  const hints: JoinHint[] = [];
  for (const raw of joinHints) {
    if (!isJsonObject(raw)) return undefined;
    const fromTable = readString(raw, 'fromTable');
    const fromColumn = readString(raw, 'fromColumn');
    const toTable = readString(raw, 'toTable');
    const toColumn = readString(raw, 'toColumn');
    if (!fromTable || !fromColumn || !toTable || !toColumn) return undefined;
    hints.push({ fromTable, fromColumn, toTable, toColumn });
  }

  return {
    relevantTables: relevantTables.filter((t): t is string => typeof t === 'string'),
    renderedText,
    joinHints: hints,
  };
}
