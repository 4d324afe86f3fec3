import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { defaultAnalyticsConfig } from '../../src/config/index.js';
import { DedupEngine } from '../../src/services/dedupEngine.js';
import { getLogger, __resetLoggerForTests, __enableTestLogCollector } from '../../src/utils/logging.js';

describe('logging singleton', () => {
  const previousLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    __resetLoggerForTests();
  });

  afterEach(() => {
    if (previousLevel === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = previousLevel;
    __resetLoggerForTests();
  });

  it('returns same instance', () => {
    const a = getLogger();
    const b = getLogger();
    expect(a).toBe(b);
  });

  it('honors LOG_LEVEL env', () => {
    process.env.LOG_LEVEL = 'debug';
    __resetLoggerForTests();
    const l = getLogger();
    expect(l.level).toBe('debug');
  });

  it('collects structured engine decisions', () => {
    const logs = __enableTestLogCollector();
    const engine = new DedupEngine(
      { findByContentHash: () => null, listSameDay: () => [] },
      defaultAnalyticsConfig().dedup,
    );
    engine.check({ title: 'Vendor outage', content: '', publishedAt: new Date('2026-03-14T10:00:00Z') });
    const entries: Array<{ msg: string; path?: string; poolSize?: number }> = logs.map((l) => JSON.parse(l));
    const decision = entries.find((e) => e.msg === 'dedup-decision');
    expect(decision).toMatchObject({ path: 'none', poolSize: 0 });
  });
});
