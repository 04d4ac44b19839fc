/**
 * Relative time expressions: extraction from normalized text and resolution
 * into half-open UTC date ranges.
 */

const UNIT = '(day|week|month|quarter|year)s?';

const TIME_PATTERNS: readonly RegExp[] = [
  /\btoday\b/g,
  /\byesterday\b/g,
  /\b(?:this|last|past|previous) (?:week|month|quarter|year)\b/g,
  new RegExp(`\\b(?:last|past|previous) \\d+ ${UNIT}\\b`, 'g'),
  /\b\d{4}-\d{2}-\d{2}\b/g,
  /\bin (?:19|20)\d{2}\b/g,
];

/**
 * Time expressions in order of appearance.
 */
export function extractTimeExpressions(text: string): string[] {
  const found: Array<{ index: number; end: number; value: string }> = [];
  for (const pattern of TIME_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const index = match.index ?? 0;
      found.push({ index, end: index + match[0].length, value: match[0] });
    }
  }
  found.sort((a, b) => a.index - b.index || b.end - a.end);

  const result: string[] = [];
  let coveredUntil = -1;
  for (const item of found) {
    if (item.index < coveredUntil) continue;
    result.push(item.value);
    coveredUntil = item.end;
  }
  return result;
}

export interface DateRange {
  /** Inclusive, `YYYY-MM-DD`. */
  readonly start: string;
  /** Exclusive, `YYYY-MM-DD`. */
  readonly end: string;
}

function utcDay(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month, day));
}

function addDays(date: Date, days: number): Date {
  return utcDay(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate() + days);
}

function addMonths(date: Date, months: number): Date {
  return utcDay(date.getUTCFullYear(), date.getUTCMonth() + months, date.getUTCDate());
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function range(start: Date, end: Date): DateRange {
  return { start: isoDate(start), end: isoDate(end) };
}

function startOfWeek(day: Date): Date {
  // Weeks start on Monday
  const offset = (day.getUTCDay() + 6) % 7;
  return addDays(day, -offset);
}

function startOfQuarter(day: Date): Date {
  return utcDay(day.getUTCFullYear(), Math.floor(day.getUTCMonth() / 3) * 3, 1);
}

/**
 * Resolve one expression produced by {@link extractTimeExpressions}.
 * Returns undefined for anything it does not recognise.
 */
export function resolveTimeRange(expression: string, now: Date): DateRange | undefined {
  const today = utcDay(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  const tomorrow = addDays(today, 1);

  if (expression === 'today') return range(today, tomorrow);
  if (expression === 'yesterday') return range(addDays(today, -1), today);

  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(expression);
  if (iso) {
    const day = utcDay(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]));
    if (Number.isNaN(day.getTime())) return undefined;
    return range(day, addDays(day, 1));
  }

  const year = /^in (\d{4})$/.exec(expression);
  if (year) {
    const y = Number(year[1]);
    return range(utcDay(y, 0, 1), utcDay(y + 1, 0, 1));
  }

  const period = /^(this|last|past|previous) (week|month|quarter|year)$/.exec(expression);
  if (period) {
    const back = period[1] === 'this' ? 0 : 1;
    switch (period[2]) {
      case 'week': {
        const start = addDays(startOfWeek(today), -7 * back);
        return range(start, addDays(start, 7));
      }
      case 'month': {
        const start = utcDay(today.getUTCFullYear(), today.getUTCMonth() - back, 1);
        return range(start, addMonths(start, 1));
      }
      case 'quarter': {
        const start = addMonths(startOfQuarter(today), -3 * back);
        return range(start, addMonths(start, 3));
      }
      case 'year': {
        const start = utcDay(today.getUTCFullYear() - back, 0, 1);
        return range(start, utcDay(start.getUTCFullYear() + 1, 0, 1));
      }
    }
  }

  const span = /^(?:last|past|previous) (\d+) (day|week|month|quarter|year)s?$/.exec(expression);
  if (span) {
    const amount = Number(span[1]);
    switch (span[2]) {
      case 'day':
        return range(addDays(today, -amount), tomorrow);
      case 'week':
        return range(addDays(today, -7 * amount), tomorrow);
      case 'month':
        return range(addMonths(today, -amount), tomorrow);
      case 'quarter':
        return range(addMonths(today, -3 * amount), tomorrow);
      case 'year':
        return range(addMonths(today, -12 * amount), tomorrow);
    }
  }

  return undefined;
}
