#!/usr/bin/env node
import { closeDb } from '../db/client.js';
import { getLogger } from '../utils/logging.js';
import { buildProgram } from './program.js';

buildProgram()
  .parseAsync(process.argv)
  .then(() => closeDb())
  .catch((err: unknown) => {
    getLogger().error({ err }, 'command failed');
    console.error(err instanceof Error ? err.message : err);
    closeDb();
    process.exit(1);
  });
