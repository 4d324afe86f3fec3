import { describe, it, expect } from 'vitest';
import { defaultAnalyticsConfig } from '../../src/config/index.js';
import {
  assessThreat,
  energyBurstZ,
  hasLocationReference,
  hasTimeReference,
  type SubjectMention,
} from '../../src/services/threatAssessment.js';

const analytics = defaultAnalyticsConfig();
const NOW = new Date('2026-03-14T12:00:00Z');

function mention(id: string, iso: string, title: string, content = ''): SubjectMention {
  return { alertId: id, title, content, publishedAt: new Date(iso), entities: [{ type: 'poi', value: 'Jane Roe' }] };
}

describe('assessThreat', () => {
  it('combines fixation, leakage, pathway and targeting flags', () => {
    const result = assessThreat(
      'Jane Roe',
      [
        mention('m0', '2026-02-20T10:00:00Z', 'I will find her at the venue tomorrow'),
        mention('m1', '2026-03-10T09:00:00Z', 'Forum thread names Jane Roe'),
        mention('m2', '2026-03-14T08:00:00Z', 'I will be at the venue tomorrow'),
      ],
      NOW,
      analytics.threat,
      analytics.anomaly,
    );
    expect(result).toMatchObject({
      subject: 'Jane Roe',
      flags: { fixation: true, energyBurst: false, leakage: true, pathway: true, targetingSpecificity: true },
      score: 80,
      energyZ: 0,
      distinctDays: 2,
      hits: 2,
    });
    expect(result.windowStart.toISOString()).toBe('2026-03-01T00:00:00.000Z');
    expect(result.windowEnd.toISOString()).toBe('2026-03-15T00:00:00.000Z');
  });

  it('flags an energy burst against the trailing daily counts', () => {
    const mentions: SubjectMention[] = [];
    for (const day of ['07', '08', '09', '10', '11', '12', '13']) {
      mentions.push(mention(`d${day}`, `2026-03-${day}T10:00:00Z`, 'Routine mention'));
    }
    for (let i = 0; i < 5; i++) mentions.push(mention(`t${i}`, `2026-03-14T0${i}:00:00Z`, 'Routine mention'));
    const result = assessThreat('Jane Roe', mentions, NOW, analytics.threat, analytics.anomaly);
    expect(result.flags).toEqual({
      fixation: true,
      energyBurst: true,
      leakage: false,
      pathway: false,
      targetingSpecificity: false,
    });
    expect(result.energyZ).toBe(8);
    expect(result.score).toBe(45);
    expect(result.hits).toBe(12);
  });

  it('scores zero with no mentions', () => {
    const result = assessThreat('Nobody', [], NOW, analytics.threat, analytics.anomaly);
    expect(result.score).toBe(0);
    expect(result.distinctDays).toBe(0);
  });
});

describe('reference patterns', () => {
  it('detects time references', () => {
    expect(hasTimeReference('meet at 9:30')).toBe(true);
    expect(hasTimeReference('sometime later')).toBe(false);
  });

  it('accepts a location entity or a location phrase', () => {
    const base = { alertId: 'x', title: 'note', content: '', publishedAt: NOW };
    expect(hasLocationReference({ ...base, entities: [{ type: 'location', value: 'Pier 39' }] })).toBe(true);
    expect(hasLocationReference({ ...base, content: 'outside 12 Main Street', entities: [] })).toBe(true);
    expect(hasLocationReference({ ...base, entities: [] })).toBe(false);
  });

  it('needs enough baseline days before computing a burst z', () => {
    const counts = new Map([
      ['2026-03-12', 1],
      ['2026-03-14', 4],
    ]);
    expect(energyBurstZ(counts, '2026-03-14', analytics.anomaly)).toBeNull();
  });
});
