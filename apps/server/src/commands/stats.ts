import { Command } from 'commander';
import chalk from 'chalk';
import { createDb, getRawDb, getStats, TASK_STATUSES, PRIORITIES } from '@taskapi/core';
import type { ServerConfig } from '../config.js';
import * as out from '../output.js';
import { resolveConfig, $try, type GlobalOptions } from '../helpers.js';

export function createStatsCommand(config: ServerConfig): Command {
  return new Command('stats')
    .description('Show task counts by status and priority')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const { dbPath } = resolveConfig(config, cmd.optsWithGlobals<GlobalOptions>());
      const db = createDb(dbPath);
      try {
        const stats = getStats(db);
        if (stats.total === 0) {
          out.info('No tasks found');
          return;
        }

        console.log(chalk.bold.underline('Tasks'));
        console.log();
        console.log(`  Total: ${chalk.bold(String(stats.total))}`);
        console.log(`  Status: ${TASK_STATUSES.map(s => out.formatStatus(s, stats.byStatus[s])).join(', ')}`);
        console.log(`  Priority: ${PRIORITIES.map(p => out.formatPriority(p, stats.byPriority[p])).join(', ')}`);
      } finally {
        getRawDb(db).close();
      }
    }));
}
