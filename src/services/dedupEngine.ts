import type { DedupConfig } from '../config/index.js';
import type { DuplicateDecision } from '../core/types.js';
import { duplicatesTotal } from '../metrics/index.js';
import { sha256Hex } from '../utils/hashing.js';
import { getLogger } from '../utils/logging.js';
import { sequenceRatio } from '../utils/similarity.js';
import { dayKey } from '../utils/time.js';

export interface DedupCandidate {
  title: string;
  content: string;
  publishedAt: Date;
}

export interface PoolEntry {
  id: string;
  title: string;
  contentHash: string;
  publishedAt: Date;
  isDuplicateOf?: string | null;
}

/** Lookup of canonical (non-duplicate) alerts by content fingerprint. */
export interface FingerprintIndex {
  findByContentHash(contentHash: string): string | null;
}

export interface DedupStore extends FingerprintIndex {
  listSameDay(day: string, limit: number): PoolEntry[];
}

export function normalizeText(text: string | null | undefined, maxLength = 200): string {
  if (!text) return '';
  return text
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase()
    .slice(0, maxLength);
}

export function computeContentHash(title: string, content: string, maxLength = 200): string {
  return sha256Hex(normalizeText(`${title || ''} ${content || ''}`, maxLength));
}

/**
 * Two-tier duplicate check. The fingerprint path is an O(1) index lookup; the
 * fuzzy path compares normalized titles against at most `maxCandidates`
 * same-day alerts, most recent first.
 */
export function dedupe(
  candidate: DedupCandidate,
  sameDayPool: PoolEntry[],
  cfg: DedupConfig,
  index?: FingerprintIndex,
): DuplicateDecision {
  const normalized = normalizeText(`${candidate.title || ''} ${candidate.content || ''}`, cfg.maxNormalizedLength);
  const contentHash = sha256Hex(normalized);
  if (!normalized) {
    return { isDuplicate: false, duplicateOf: null, confidence: 0, path: 'empty', contentHash };
  }

  const canonicalPool = sameDayPool.filter((p) => !p.isDuplicateOf);
  const fingerprintHit =
    index?.findByContentHash(contentHash) ??
    canonicalPool.find((p) => p.contentHash === contentHash)?.id ??
    null;
  if (fingerprintHit) {
    return { isDuplicate: true, duplicateOf: fingerprintHit, confidence: 1.0, path: 'fingerprint', contentHash };
  }

  const title = normalizeText(candidate.title, cfg.maxNormalizedLength);
  if (!title) {
    return { isDuplicate: false, duplicateOf: null, confidence: 0, path: 'empty', contentHash };
  }

  const day = dayKey(candidate.publishedAt);
  const bounded = canonicalPool
    .filter((p) => dayKey(p.publishedAt) === day)
    .sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime() || (a.id < b.id ? 1 : -1))
    .slice(0, cfg.maxCandidates);

  let bestId: string | null = null;
  let bestRatio = 0;
  for (const entry of bounded) {
    const ratio = sequenceRatio(title, normalizeText(entry.title, cfg.maxNormalizedLength));
    if (ratio >= cfg.fuzzyThreshold && ratio > bestRatio) {
      bestRatio = ratio;
      bestId = entry.id;
    }
  }
  if (bestId) {
    return {
      isDuplicate: true,
      duplicateOf: bestId,
      confidence: Math.round(bestRatio * 1000) / 1000,
      path: 'fuzzy_title',
      contentHash,
    };
  }
  return { isDuplicate: false, duplicateOf: null, confidence: 0, path: 'none', contentHash };
}

export class DedupEngine {
  constructor(
    private store: DedupStore,
    private cfg: DedupConfig,
  ) {}

  check(candidate: DedupCandidate): DuplicateDecision {
    const pool = this.store.listSameDay(dayKey(candidate.publishedAt), this.cfg.maxCandidates);
    const decision = dedupe(candidate, pool, this.cfg, this.store);
    if (decision.isDuplicate) duplicatesTotal.inc({ path: decision.path });
    getLogger().debug(
      {
        path: decision.path,
        duplicateOf: decision.duplicateOf,
        confidence: decision.confidence,
        poolSize: pool.length,
      },
      'dedup-decision',
    );
    return decision;
  }
}
