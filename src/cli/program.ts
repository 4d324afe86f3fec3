import { Command, InvalidArgumentError } from 'commander';
import fs from 'fs';
import path from 'path';
import { loadConfig } from '../config/index.js';
import { getDb } from '../db/client.js';
import { AnalyticsService } from '../services/analyticsService.js';
import { getLogger } from '../utils/logging.js';

export interface CliDeps {
  service?: () => AnalyticsService;
  out?: (line: string) => void;
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
  return n;
}

function parseFraction(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0 || n > 1) throw new InvalidArgumentError('Expected a number in [0, 1].');
  return n;
}

export function buildProgram(deps: CliDeps = {}): Command {
  let service: AnalyticsService | undefined;
  const getService = () => (service ??= deps.service ? deps.service() : new AnalyticsService());
  const out = deps.out ?? ((line: string) => console.log(line));
  const print = (value: unknown) => out(JSON.stringify(value, null, 2));

  const program = new Command();
  program.name('threadwatch').description('Alert scoring and correlation CLI').version('0.1.0');

  program
    .command('init')
    .description('Create the local database (schema applied on open) and a .env if missing')
    .action(() => {
      const cfg = loadConfig();
      if (!process.env.DATABASE_URL) {
        const envPath = path.resolve(process.cwd(), '.env');
        if (!fs.existsSync(envPath)) {
          fs.writeFileSync(envPath, `DATABASE_URL=${cfg.database.url}\n`);
          out(`Created .env with DATABASE_URL=${cfg.database.url}`);
        }
      }
      getDb();
      getLogger().info({ db: cfg.database.url }, 'database initialized');
      out('Initialized.');
    });

  program
    .command('score')
    .requiredOption('--alert-id <id>', 'Alert id to score')
    .option('--samples <n>', 'Monte Carlo samples for an uncertainty interval', parseInteger)
    .option('--seed <n>', 'Seed for the interval sampler', parseInteger)
    .description('Score one alert and print its breakdown (and interval when requested)')
    .action(async (opts: { alertId: string; samples?: number; seed?: number }) => {
      const result = await getService().scoreAlert(opts.alertId, {
        samples: opts.samples,
        seed: opts.seed,
      });
      print(result);
    });

  program
    .command('rescore')
    .description('Re-score every non-duplicate alert against current credibility and frequency')
    .action(async () => {
      const rescored = await getService().rescoreAll();
      print({ rescored });
    });

  program
    .command('correlate')
    .requiredOption('--start <ts>', 'Window start (ISO timestamp)')
    .requiredOption('--end <ts>', 'Window end (ISO timestamp)')
    .option('--min-cluster <n>', 'Minimum thread size', parseInteger)
    .option('--threshold <x>', 'Edge threshold in [0, 1]', parseFraction)
    .description('Cluster alerts in a window into investigation threads')
    .action(async (opts: { start: string; end: string; minCluster?: number; threshold?: number }) => {
      const result = await getService().runCorrelation({
        windowStart: opts.start,
        windowEnd: opts.end,
        minClusterSize: opts.minCluster,
        edgeThreshold: opts.threshold,
      });
      print(result);
    });

  program
    .command('spikes')
    .option('--day <YYYY-MM-DD>', 'UTC day to inspect (default today)')
    .description('List keywords whose count on the day spikes over their trailing average')
    .action((opts: { day?: string }) => {
      print({ spikes: getService().detectSpikes(opts.day) });
    });

  return program;
}
