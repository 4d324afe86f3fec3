import type { PoiConfig } from '../config/index.js';
import type { PoiAlias, PoiHit, TypedEntity } from '../core/types.js';
import { phraseRegExp } from '../utils/phrase.js';
import { sequenceRatio } from '../utils/similarity.js';

// Starts and ends on a letter, digit or underscore; inner ' . - are kept ("O'Neil", "Jen-Hsun").
const TEXT_TOKEN = /[\p{L}\p{N}_](?:[\p{L}\p{N}_'.-]*[\p{L}\p{N}_])?/gu;

const SINGLE_TOKEN_SCORE = 0.35;

interface Span {
  start: number;
  end: number;
}

interface Token extends Span {
  text: string;
}

const round3 = (v: number) => Math.round(v * 1000) / 1000;

function contextSnippet(text: string, span: Span, window: number): string {
  const left = Math.max(0, span.start - window);
  const right = Math.min(text.length, span.end + window);
  return text.slice(left, right).split(/\s+/).filter(Boolean).join(' ');
}

function exactSpans(text: string, alias: string): Span[] {
  return [...text.matchAll(phraseRegExp(alias))].map((m) => ({
    start: m.index ?? 0,
    end: (m.index ?? 0) + m[0].length,
  }));
}

function tokenSpans(text: string): Token[] {
  return [...text.matchAll(TEXT_TOKEN)].map((m) => ({
    text: m[0],
    start: m.index ?? 0,
    end: (m.index ?? 0) + m[0].length,
  }));
}

/** Slides a window of the alias's token count over the text; multi-token aliases only. */
function fuzzySpans(tokens: Token[], alias: string, threshold: number): Array<Span & { score: number }> {
  const width = alias.split(/\s+/).length;
  if (width < 2 || tokens.length < width) return [];
  const lowered = alias.toLowerCase();
  const out: Array<Span & { score: number }> = [];
  for (let i = 0; i + width <= tokens.length; i++) {
    const window = tokens.slice(i, i + width);
    const score = sequenceRatio(lowered, window.map((t) => t.text).join(' ').toLowerCase());
    if (score >= threshold) out.push({ start: window[0].start, end: window[width - 1].end, score });
  }
  return out;
}

/**
 * Finds the POIs an alert text names. Multi-token aliases match exactly
 * (score 1) or fuzzily; single-token aliases only count when enabled, and
 * then only as supporting evidence. Best scores first.
 */
export function matchPois(text: string, aliases: PoiAlias[], cfg: PoiConfig): PoiHit[] {
  const safeText = text || '';
  const tokens = tokenSpans(safeText);
  const seen = new Set<string>();
  const hits: PoiHit[] = [];

  const add = (row: PoiAlias, alias: string, span: Span, hit: Pick<PoiHit, 'matchType' | 'matchScore'>) => {
    const key = `${row.poiId}\u0000${alias.toLowerCase()}\u0000${span.start}`;
    if (seen.has(key)) return;
    seen.add(key);
    hits.push({
      poiId: row.poiId,
      poiName: row.poiName,
      matchValue: alias,
      context: contextSnippet(safeText, span, cfg.contextWindow),
      ...hit,
    });
  };

  for (const row of aliases) {
    const alias = row.alias.trim();
    if (!alias) continue;
    const multiToken = alias.split(/\s+/).length >= 2;
    if (multiToken || cfg.allowSingleToken) {
      const exact: Pick<PoiHit, 'matchType' | 'matchScore'> = multiToken
        ? { matchType: 'exact', matchScore: 1 }
        : { matchType: 'supporting_single_token', matchScore: SINGLE_TOKEN_SCORE };
      for (const span of exactSpans(safeText, alias)) add(row, alias, span, exact);
    }
    for (const span of fuzzySpans(tokens, alias, cfg.fuzzyThreshold)) {
      add(row, alias, span, { matchType: 'fuzzy', matchScore: round3(span.score) });
    }
  }

  return hits.sort((a, b) => b.matchScore - a.matchScore);
}

/** One `poi` entity per matched POI, named by its canonical name. */
export function poiEntities(hits: PoiHit[]): TypedEntity[] {
  return [...new Set(hits.map((h) => h.poiName))].map((value): TypedEntity => ({ type: 'poi', value }));
}
