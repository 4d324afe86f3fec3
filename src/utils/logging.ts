import pino, { DestinationStream } from 'pino';
import { Writable } from 'stream';
import { loadConfig } from '../config/index.js';

let loggerInstance: pino.Logger | null = null;

function collectorSink(): { logs: string[]; sink: DestinationStream } {
  const logs: string[] = [];
  (globalThis as unknown as { __LOG_COLLECTOR__?: string[] }).__LOG_COLLECTOR__ = logs;
  const sink = new Writable({
    write(chunk, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
  return { logs, sink };
}

function options(level: string): pino.LoggerOptions {
  return { name: 'threadwatch', level };
}

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const cfg = loadConfig();
    if (process.env.TEST_LOG_COLLECTOR === '1') {
      loggerInstance = pino(options(cfg.logging.level), collectorSink().sink);
    } else {
      loggerInstance = pino({
        ...options(cfg.logging.level),
        transport: cfg.logging.json ? undefined : { target: 'pino-pretty' },
      });
    }
  }
  return loggerInstance;
}

// Test-only helper to reset singleton
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Force-enable in-memory log collection for tests regardless of env timing
export function __enableTestLogCollector(level: pino.LevelWithSilent = 'debug') {
  const { logs, sink } = collectorSink();
  loggerInstance = pino(options(level), sink);
  return logs;
}
