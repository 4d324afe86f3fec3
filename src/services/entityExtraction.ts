import type { EntityType, TypedEntity } from '../core/types.js';

// Hash patterns require at least one digit and one a-f letter; all-digit or
// all-letter hex runs are not reported as file hashes.
const HEX_MIXED = '(?=[a-fA-F0-9]*[0-9])(?=[a-fA-F0-9]*[a-fA-F])';

const IOC_PATTERNS: Array<[EntityType, RegExp]> = [
  ['url', /\bhttps?:\/\/[^\s<>'")]+/gi],
  ['ipv4', /\b(?:(?:25[0-5]|2[0-4]\d|1?\d?\d)\.){3}(?:25[0-5]|2[0-4]\d|1?\d?\d)\b/g],
  ['domain', /\b(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[A-Za-z]{2,24}\b/g],
  ['cve', /\bCVE-\d{4}-\d{4,7}\b/gi],
  ['md5', new RegExp(`\\b${HEX_MIXED}[a-fA-F0-9]{32}\\b`, 'g')],
  ['sha1', new RegExp(`\\b${HEX_MIXED}[a-fA-F0-9]{40}\\b`, 'g')],
  ['sha256', new RegExp(`\\b${HEX_MIXED}[a-fA-F0-9]{64}\\b`, 'g')],
];

function normalizeValue(type: EntityType, value: string): string {
  const trimmed = value.trim().replace(/[.,);]+$/, '');
  if (type === 'cve') return trimmed.toUpperCase();
  if (type === 'domain' || type === 'md5' || type === 'sha1' || type === 'sha256') {
    return trimmed.toLowerCase();
  }
  return trimmed;
}

/** Regex-only indicator extraction. Domains inside a matched URL are skipped. */
export function extractIocs(text: string): TypedEntity[] {
  const raw = text || '';
  const urlSpans = [...raw.matchAll(IOC_PATTERNS[0][1])].map((m) => [
    m.index ?? 0,
    (m.index ?? 0) + m[0].length,
  ]);
  const inUrl = (start: number, end: number) =>
    urlSpans.some(([s, e]) => start < e && end > s);

  const seen = new Set<string>();
  const findings: TypedEntity[] = [];
  for (const [type, pattern] of IOC_PATTERNS) {
    for (const match of raw.matchAll(pattern)) {
      const start = match.index ?? 0;
      if (type === 'domain' && inUrl(start, start + match[0].length)) continue;
      const value = normalizeValue(type, match[0]);
      const key = `${type}:${value}`;
      if (!value || seen.has(key)) continue;
      seen.add(key);
      findings.push({ type, value });
    }
  }
  return findings;
}

/** Union of supplied and extracted entities, first occurrence wins. */
export function mergeEntities(...groups: TypedEntity[][]): TypedEntity[] {
  const seen = new Set<string>();
  const out: TypedEntity[] = [];
  for (const group of groups) {
    for (const e of group) {
      const value = e.value.trim();
      const key = `${e.type}:${value.toLowerCase()}`;
      if (!value || seen.has(key)) continue;
      seen.add(key);
      out.push({ type: e.type, value });
    }
  }
  return out;
}
