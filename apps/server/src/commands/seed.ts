import { Command } from 'commander';
import { createDb, getRawDb, clearTasks, seedTasks } from '@taskapi/core';
import type { ServerConfig } from '../config.js';
import * as out from '../output.js';
import { loadSampleTasks, DEFAULT_SAMPLE_FILE } from '../sample-data.js';
import { resolveConfig, $try, type GlobalOptions } from '../helpers.js';

type SeedOptions = GlobalOptions & {
  reset?: boolean;
  file: string;
};

export function createSeedCommand(config: ServerConfig): Command {
  return new Command('seed')
    .description('Insert sample tasks into the database')
    .option('-r, --reset', 'Delete all tasks and restart ids before seeding')
    .option('-f, --file <path>', 'JSON array of task bodies', DEFAULT_SAMPLE_FILE)
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const opts = cmd.optsWithGlobals<SeedOptions>();
      const { dbPath } = resolveConfig(config, opts);
      const inputs = loadSampleTasks(opts.file);

      const db = createDb(dbPath);
      try {
        if (opts.reset) {
          const removed = clearTasks(db);
          out.warning(`Deleted ${removed} task(s) and reset the id counter`);
        }
        const created = seedTasks(db, inputs);
        out.success(`Inserted ${created.length} task(s) into ${dbPath}`);
      } finally {
        getRawDb(db).close();
      }
    }));
}
