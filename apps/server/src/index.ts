#!/usr/bin/env node

import { Command, Option } from 'commander';
import { readConfig, type ServerConfig } from './config.js';
import { LOG_LEVELS } from './log.js';
import * as out from './output.js';
import { createServeCommand } from './commands/serve.js';
import { createSeedCommand } from './commands/seed.js';
import { createStatsCommand } from './commands/stats.js';

function loadConfig(): ServerConfig {
  try {
    return readConfig();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

const config = loadConfig();

const program = new Command()
  .name('taskapi')
  .description('Task records over HTTP, backed by SQLite')
  .version('1.0.0')
  .option('-d, --db <path>', 'SQLite database file')
  .addOption(new Option('--log-level <level>', 'Log verbosity').choices(LOG_LEVELS));

program.addCommand(createServeCommand(config), { isDefault: true });
program.addCommand(createSeedCommand(config));
program.addCommand(createStatsCommand(config));

await program.parseAsync();
