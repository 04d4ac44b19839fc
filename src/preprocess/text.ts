/**
 * Text helpers shared by the preprocessor and the similarity strategies.
 */

import synonyms from './synonyms.json' with { type: 'json' };

const WORD_CHARS = '[\\p{L}\\p{N}_]';

/**
 * Phrase table compiled longest-first so "total number of" wins over "number of".
 */
const SYNONYM_TABLE: Record<string, string> = synonyms;

const SYNONYM_RULES: ReadonlyArray<{ pattern: RegExp; replacement: string }> = Object.entries(SYNONYM_TABLE)
  .sort(([a], [b]) => b.length - a.length)
  .map(([phrase, replacement]) => ({
    pattern: new RegExp(`(?<!${WORD_CHARS})${escapeRegExp(phrase)}(?!${WORD_CHARS})`, 'gu'),
    replacement,
  }));

export const STOPWORDS: ReadonlySet<string> = new Set([
  'a', 'an', 'the', 'all', 'any', 'of', 'for', 'in', 'on', 'at', 'to', 'and', 'or',
  'is', 'are', 'was', 'were', 'be', 'been', 'do', 'does', 'did', 'there', 'their',
  'me', 'my', 'i', 'we', 'us', 'our', 'you', 'your', 'please', 'show', 'list',
  'get', 'find', 'give', 'tell', 'what', 'which', 'who', 'whose', 'how', 'that',
  'this', 'these', 'those', 'it', 'its', 'with', 'by', 'from', 'have', 'has',
  'can', 'could', 'would', 'should', 'every', 'each', 'about', 'exist', 'exists',
]);

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * NFKC, lower case, punctuation folded to spaces, whitespace collapsed.
 * Hyphens, comparison operators and underscores survive so dates and
 * identifiers stay intact.
 */
export function normalizeText(raw: string): string {
  return raw
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s_<>=-]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Replace localized and alternative phrasings with the canonical vocabulary.
 */
export function foldSynonyms(normalized: string): string {
  let folded = normalized;
  for (const rule of SYNONYM_RULES) {
    folded = folded.replace(rule.pattern, rule.replacement);
  }
  return folded.replace(/\s+/g, ' ').trim();
}

export function words(text: string): string[] {
  return text.length === 0 ? [] : text.split(' ');
}

export function singularize(word: string): string {
  if (word.length <= 3 || /\d/.test(word)) return word;
  if (word.endsWith('ies')) return `${word.slice(0, -3)}y`;
  if (/(sses|xes|ches|shes|uses)$/.test(word)) return word.slice(0, -2);
  if (/(ss|us|is)$/.test(word)) return word;
  if (word.endsWith('s')) return word.slice(0, -1);
  return word;
}

/**
 * Split an identifier such as `order_items` or `createdAt` into lower-case words.
 */
export function identifierWords(identifier: string): string[] {
  return identifier
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .toLowerCase()
    .split(/[_\s-]+/)
    .filter((part) => part.length > 0);
}

/**
 * Content tokens used for similarity: stopwords dropped, plurals folded.
 */
export function contentTokens(text: string): string[] {
  return words(text)
    .filter((word) => !STOPWORDS.has(word))
    .map(singularize);
}
