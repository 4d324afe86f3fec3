import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { buildProgram } from '../../src/cli/program.js';
import { openDatabase } from '../../src/db/client.js';
import { AnalyticsService } from '../../src/services/analyticsService.js';

const NOW = new Date('2026-03-14T12:00:00Z');

let db: Database.Database;
let service: AnalyticsService;
let lines: string[];

function run(...args: string[]) {
  const program = buildProgram({ service: () => service, out: (line) => lines.push(line) });
  program.exitOverride().configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
  return program.parseAsync(['node', 'threadwatch', ...args]);
}

beforeEach(async () => {
  db = openDatabase(':memory:');
  service = new AnalyticsService({ db, clock: () => NOW });
  lines = [];
  service.registerSource({ id: 'src-paste', name: 'Paste monitor', sourceType: 'paste' });
  service.upsertKeyword({ term: 'supply chain attack', weight: 4, category: 'supply_chain' });
  await service.ingestAlert({
    id: 'al-1',
    title: 'Supply chain attack against build vendor',
    sourceId: 'src-paste',
    matchedTerm: 'supply chain attack',
    publishedAt: '2026-03-14T12:00:00Z',
  });
});

afterEach(() => {
  db.close();
});

describe('threadwatch CLI', () => {
  it('scores an alert with a seeded interval', async () => {
    await run('score', '--alert-id', 'al-1', '--samples', '20', '--seed', '3');
    expect(lines).toHaveLength(1);
    const out = JSON.parse(lines[0]);
    expect(out.breakdown.finalScore).toBe(52.5);
    expect(out.breakdown.computedAt).toBe('2026-03-14T12:00:00.000Z');
    expect(out.interval.n).toBe(20);
    expect(out.interval.seed).toBe(3);
  });

  it('rescores every canonical alert', async () => {
    await run('rescore');
    expect(lines).toEqual([JSON.stringify({ rescored: 1 }, null, 2)]);
  });

  it('prints keyword spikes for a day', async () => {
    await run('spikes', '--day', '2026-03-14');
    expect(lines).toEqual([JSON.stringify({ spikes: [] }, null, 2)]);
  });

  it('correlates a window', async () => {
    await run('correlate', '--start', '2026-03-14T00:00:00Z', '--end', '2026-03-14T23:59:59Z');
    const out = JSON.parse(lines[0]);
    expect(out).toMatchObject({ threads: [], alertsConsidered: 1, truncated: false });
  });

  it('rejects an out-of-range threshold before touching the service', async () => {
    await expect(
      run('correlate', '--start', '2026-03-14T00:00:00Z', '--end', '2026-03-14T23:59:59Z', '--threshold', '2'),
    ).rejects.toThrow(/Expected a number in \[0, 1\]/);
    expect(lines).toEqual([]);
  });
});
