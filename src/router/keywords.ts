import type { Classification } from '../query/types';

export const FALLBACK_CONFIDENCE = 0.5;

export const ANALYTICS_KEYWORDS = [
  'customer',
  'order',
  'product',
  'payment',
  'revenue',
  'sale',
  'total',
  'sum',
  'count',
  'average',
  'top',
  'highest',
  'lowest',
  'group by',
  'aggregate',
  'database',
  'table',
  'how many',
] as const;

export const DOCUMENT_KEYWORDS = [
  'report',
  'document',
  'pdf',
  'filing',
  'transcript',
  'sustainability',
  'earnings call',
  'finding',
  'mention',
  'mentioned',
  'says',
  'according to',
  'summarize',
  'policy',
] as const;

const patterns = new Map<string, RegExp>();

function keywordPattern(keyword: string) {
  let re = patterns.get(keyword);
  if (!re) {
    const escaped = keyword
      .replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
      .replace(/ /g, '\\s+');
    // plural forms count: "orders", "sales", "reports"
    re = new RegExp(`\\b${escaped}(?:s|es)?\\b`, 'i');
    patterns.set(keyword, re);
  }
  return re;
}

export function matchKeywords(
  question: string,
  keywords: readonly string[],
): string[] {
  return keywords.filter((kw) => keywordPattern(kw).test(question));
}

/**
 * Deterministic routing used when the model path fails. Ambiguous questions
 * (both sets or neither) go to BOTH.
 */
export function classifyByKeywords(question: string): Classification {
  const analytics = matchKeywords(question, ANALYTICS_KEYWORDS);
  const documents = matchKeywords(question, DOCUMENT_KEYWORDS);

  if (analytics.length && !documents.length) {
    return {
      route: 'STRUCTURED',
      reasoning: `Keyword fallback: analytics terms only (${analytics.join(', ')})`,
      confidence: FALLBACK_CONFIDENCE,
      strategy: 'keywords',
    };
  }

  if (documents.length && !analytics.length) {
    return {
      route: 'DOCUMENT',
      reasoning: `Keyword fallback: document terms only (${documents.join(', ')})`,
      confidence: FALLBACK_CONFIDENCE,
      strategy: 'keywords',
    };
  }

  return {
    route: 'BOTH',
    reasoning: analytics.length
      ? `Keyword fallback: both analytics (${analytics.join(', ')}) and document (${documents.join(', ')}) terms`
      : 'Keyword fallback: no known terms, asking both backends',
    confidence: FALLBACK_CONFIDENCE,
    strategy: 'keywords',
  };
}
