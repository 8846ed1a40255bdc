/**
 * Headline feature extraction: keyword sets and structural signatures.
 *
 * A signature is a normalized fingerprint of how a headline is built
 * (urgency markers, punctuation/number shape, content terms) rather than its
 * raw text, so "Fed hikes rates by 50 bps" and "Fed hikes rates by 75 bps"
 * land on the same pattern.
 */

import { readFileSync } from 'node:fs';

/** Tokens that mark a headline as urgent in itself */
const URGENCY_MARKERS: ReadonlySet<string> = new Set([
  'breaking',
  'urgent',
  'alert',
  'live',
  'update',
  'developing',
]);

const MAX_SIGNATURE_TERMS = 8;

let cachedStopwords: ReadonlySet<string> | null = null;

/**
 * Stopword list from data/stopwords.txt, read once per process.
 */
export function loadStopwords(): ReadonlySet<string> {
  if (!cachedStopwords) {
    const text = readFileSync(new URL('../../data/stopwords.txt', import.meta.url), 'utf-8');
    cachedStopwords = new Set(
      text
        .split('\n')
        .map((line) => line.trim().toLowerCase())
        .filter((line) => line.length > 0 && !line.startsWith('#'))
    );
  }
  return cachedStopwords;
}

/**
 * Lower-case word tokens; punctuation becomes whitespace, inner apostrophes
 * are dropped ("Fed's" -> "feds").
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/['’]/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim()
    .split(' ')
    .filter((token) => token.length > 0);
}

function isNumeric(token: string): boolean {
  return /^\p{N}+$/u.test(token);
}

/**
 * Stopword-filtered, case-folded content terms of a headline.
 */
export function extractKeywords(headline: string, minLength = 3): Set<string> {
  const stopwords = loadStopwords();
  const keywords = new Set<string>();

  for (const token of tokenize(headline)) {
    if (token.length < minLength || isNumeric(token) || stopwords.has(token)) {
      continue;
    }
    keywords.add(token);
  }

  return keywords;
}

export interface HeadlineSignature {
  /** Full fingerprint: shape key plus sorted content terms */
  signature: string;
  /** Markers and shape flags only */
  shapeKey: string;
  /** Content terms used in the signature */
  terms: string[];
}

/**
 * Compute the structural signature of a headline.
 */
export function headlineSignature(headline: string, minLength = 3): HeadlineSignature {
  const tokens = tokenize(headline);

  const markers = [...new Set(tokens.filter((t) => URGENCY_MARKERS.has(t)))].sort();
  if (headline.includes('!!!')) {
    markers.push('!!!');
  }

  let flags = '';
  if (/\p{N}/u.test(headline)) flags += 'n';
  if (/["“”]|(^|\s)'|'(\s|$)/u.test(headline)) flags += 'q';
  if (headline.includes(':')) flags += 'c';
  if (headline.includes('?')) flags += 'x';

  const terms = [...extractKeywords(headline, minLength)]
    .filter((t) => !URGENCY_MARKERS.has(t))
    .sort()
    .slice(0, MAX_SIGNATURE_TERMS);

  const shapeKey = `m:${markers.join('+') || '-'}|f:${flags || '-'}`;
  return {
    signature: `${shapeKey}|t:${terms.join(',')}`,
    shapeKey,
    terms,
  };
}

/**
 * Terms part of a stored signature.
 */
export function signatureTerms(signature: string): string[] {
  const idx = signature.indexOf('|t:');
  if (idx === -1) return [];
  const list = signature.slice(idx + 3);
  return list ? list.split(',') : [];
}

/**
 * Jaccard similarity of two term lists (1 when both are empty).
 */
export function termSimilarity(a: readonly string[], b: readonly string[]): number {
  if (a.length === 0 && b.length === 0) return 1;
  const setA = new Set(a);
  const setB = new Set(b);
  let shared = 0;
  for (const term of setA) {
    if (setB.has(term)) shared++;
  }
  return shared / (setA.size + setB.size - shared);
}
