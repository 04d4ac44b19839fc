/**
 * Question preprocessing: normalization, synonym folding, classification and
 * lexical extraction of schema entities, time expressions and aggregations.
 *
 * Everything here is derived from the question text and the static tables; no
 * external service is involved.
 */

import type {
  AggregateFunction,
  ColumnMatch,
  ProcessedQuery,
  QueryCategory,
  SchemaSnapshot,
  TableMatch,
} from '../types/models.js';
import { foldSynonyms, identifierWords, normalizeText, singularize, words } from './text.js';
import { extractTimeExpressions } from './time.js';

const TIME_UNIT_AHEAD = '(?!\\s+(?:days?|weeks?|months?|quarters?|years?)\\b)';

const CATEGORY_PATTERNS: Readonly<Record<Exclude<QueryCategory, 'lookup' | 'group_by'>, readonly RegExp[]>> = {
  non_query: [/^(?:hi|hello|hey|thanks|thank you|ok|okay|bye|good (?:morning|afternoon|evening))(?: there)?$/],
  schema_meta: [
    /\b(?:schema|structure)\b/,
    /\b(?:what|which|list|show) (?:tables|columns|fields)\b/,
    /\bdescribe (?:the )?(?:database|db|tables?)\b/,
    /\b(?:columns|fields) (?:in|of)\b/,
  ],
  ranking: [
    /\b(?:top|bottom)(?:\s+\d+)?\b/,
    new RegExp(`\\b(?:first|last)\\s+\\d+\\b${TIME_UNIT_AHEAD}`),
    /\b(?:most|least|best|worst|highest|lowest|largest|smallest)\b/,
    /\brank(?:ing|ed)?\b/,
  ],
  aggregation: [/\bcount\b/, /\b(?:sum|total)\b/, /\bavg\b/, /\b(?:max|min)\b/, /\bstatistics\b/],
  nested: [
    /\b(?:not in|exclude|excluding|without|subquery|nested|never)\b/,
    /\bthose (?:who|which|that) (?:do not|don't|have not|haven't|did not|didn't)\b/,
    /\b(?:above|below) (?:the )?avg\b/,
  ],
  join: [
    /\b(?:join|joined|along with|together with|combined with)\b/,
    /\bwith (?:their|its|the)?\s*\w*\s*(?:information|info|details)\b/,
  ],
  filter: [
    /\b(?:where|filter|filtered|equals|equal to|between|contains|starts with|ends with|like|since|before|after)\b/,
    /\b(?:greater|less|more|fewer) than\b/,
    /\bat (?:least|most)\b/,
    /[<>=]/,
  ],
};

const GROUP_CUES: readonly RegExp[] = [/\bgroup by\b/, /\bper \S+/, /\beach \S+/, /\bby \p{L}/u];

const LOOKUP_CUES = /\b(?:show|list|get|find|display|which|what|all)\b/;

const AGGREGATION_CUES: ReadonlyArray<[AggregateFunction, RegExp]> = [
  ['count', /\bcount\b/g],
  ['sum', /\b(?:sum|total)\b/g],
  ['avg', /\bavg\b/g],
  ['max', /\b(?:max|highest|largest)\b/g],
  ['min', /\b(?:min|lowest|smallest)\b/g],
];

const LIMIT_PATTERNS: readonly RegExp[] = [
  new RegExp(`\\b(?:top|first|bottom|last)\\s+(\\d+)\\b${TIME_UNIT_AHEAD}`),
  /\b(\d+)\s+(?:most|best|worst|highest|lowest|largest|smallest|top)\b/,
];

interface Span {
  start: number;
  end: number;
}

/**
 * Find where a multi-word identifier occurs in the question, comparing
 * singular forms on both sides.
 */
function findPhrase(questionWords: readonly string[], phrase: readonly string[]): Span | undefined {
  if (phrase.length === 0) return undefined;
  for (let i = 0; i + phrase.length <= questionWords.length; i++) {
    let matched = true;
    for (let j = 0; j < phrase.length; j++) {
      if (questionWords[i + j] !== phrase[j]) {
        matched = false;
        break;
      }
    }
    if (matched) return { start: i, end: i + phrase.length };
  }
  return undefined;
}

function identifierPhrase(name: string): string[] {
  return words(foldSynonyms(identifierWords(name).join(' '))).map(singularize);
}

export class QueryPreprocessor {
  /**
   * Process a question. When a snapshot is given, table and column names are
   * matched against it; otherwise entities stay empty.
   */
  process(question: string, snapshot?: SchemaSnapshot): ProcessedQuery {
    const normalizedText = foldSynonyms(normalizeText(question));
    const questionWords = words(normalizedText).map(singularize);

    const { tables, columns } = snapshot
      ? this.matchEntities(questionWords, snapshot)
      : { tables: [], columns: [] };

    const entities: string[] = [];
    const ordered = [
      ...tables.map((t) => ({ name: t.table, position: t.position })),
      ...columns.map((c) => ({ name: c.column, position: c.position })),
    ].sort((a, b) => a.position - b.position);
    for (const item of ordered) {
      if (!entities.includes(item.name)) entities.push(item.name);
    }

    const timeExpressions = extractTimeExpressions(normalizedText);
    const { category, confidence } = this.classify(normalizedText, tables.length, timeExpressions.length, entities.length);

    return {
      original: question,
      normalizedText,
      category,
      entities,
      tables,
      columns,
      timeExpressions,
      aggregations: this.extractAggregations(normalizedText),
      limit: this.extractLimit(normalizedText),
      confidence,
    };
  }

  private classify(
    text: string,
    tableCount: number,
    timeCount: number,
    entityCount: number
  ): { category: QueryCategory; confidence: number } {
    if (text.length === 0) {
      return { category: 'lookup', confidence: 0 };
    }

    const hits = (category: keyof typeof CATEGORY_PATTERNS): number =>
      CATEGORY_PATTERNS[category].filter((pattern) => pattern.test(text)).length;
    const scored = (category: QueryCategory, count: number) => ({
      category,
      confidence: Math.min(0.5 + 0.2 * count, 1),
    });

    const nonQuery = hits('non_query');
    if (nonQuery > 0) return scored('non_query', nonQuery);

    const schemaMeta = hits('schema_meta');
    if (schemaMeta > 0) return scored('schema_meta', schemaMeta);

    const ranking = hits('ranking');
    if (ranking > 0) return scored('ranking', ranking);

    const aggregation = hits('aggregation');
    if (aggregation > 0) {
      const grouping = GROUP_CUES.filter((pattern) => pattern.test(text)).length;
      return grouping > 0 ? scored('group_by', aggregation + grouping) : scored('aggregation', aggregation);
    }

    const nested = hits('nested');
    if (nested > 0) return scored('nested', nested);

    const join = hits('join') + (tableCount >= 2 ? 1 : 0);
    if (join > 0) return scored('join', join);

    const filter = hits('filter') + (timeCount > 0 ? 1 : 0);
    if (filter > 0) return scored('filter', filter);

    if (LOOKUP_CUES.test(text) || entityCount > 0) {
      return { category: 'lookup', confidence: 0.5 };
    }
    return { category: 'lookup', confidence: 0 };
  }

  private matchEntities(
    questionWords: readonly string[],
    snapshot: SchemaSnapshot
  ): { tables: TableMatch[]; columns: ColumnMatch[] } {
    const tableSpans: Array<TableMatch & Span> = [];
    const columns: ColumnMatch[] = [];

    for (const table of snapshot.tables.values()) {
      const span = findPhrase(questionWords, identifierPhrase(table.name));
      if (span) {
        tableSpans.push({ table: table.name, position: span.start, ...span });
      }
      for (const column of table.columns) {
        const columnSpan = findPhrase(questionWords, identifierPhrase(column.name));
        if (columnSpan) {
          columns.push({ table: table.name, column: column.name, position: columnSpan.start });
        }
      }
    }

    // "order items" should not also report "orders"
    const tables = tableSpans
      .filter(
        (inner) =>
          !tableSpans.some(
            (outer) =>
              outer !== inner &&
              outer.end - outer.start > inner.end - inner.start &&
              outer.start <= inner.start &&
              outer.end >= inner.end
          )
      )
      .sort((a, b) => a.position - b.position)
      .map(({ table, position }) => ({ table, position }));

    columns.sort((a, b) => a.position - b.position);
    return { tables, columns };
  }

  private extractAggregations(text: string): AggregateFunction[] {
    const found: Array<{ fn: AggregateFunction; index: number }> = [];
    for (const [fn, pattern] of AGGREGATION_CUES) {
      for (const match of text.matchAll(pattern)) {
        found.push({ fn, index: match.index ?? 0 });
      }
    }
    found.sort((a, b) => a.index - b.index);

    const result: AggregateFunction[] = [];
    for (const { fn } of found) {
      if (!result.includes(fn)) result.push(fn);
    }
    return result;
  }

  private extractLimit(text: string): number | undefined {
    for (const pattern of LIMIT_PATTERNS) {
      const match = pattern.exec(text);
      if (match) {
        const value = Number(match[1]);
        if (Number.isInteger(value) && value > 0) return value;
      }
    }
    return undefined;
  }
}
