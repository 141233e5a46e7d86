import { Command, Option } from 'commander';
import { createDb, getRawDb } from '@taskapi/core';
import type { ServerConfig } from '../config.js';
import { createLogger } from '../log.js';
import { createApp } from '../app.js';
import { startServer, stopServer } from '../server.js';
import { resolveConfig, parsePort, $try, type ServeOptions } from '../helpers.js';

export function createServeCommand(config: ServerConfig): Command {
  return new Command('serve')
    .description('Start the HTTP API')
    .addOption(new Option('-H, --host <host>', 'Interface to bind'))
    .addOption(new Option('-p, --port <port>', 'Port to listen on').argParser(parsePort))
    .action((_opts: unknown, cmd: Command) => $try(async () => {
      const effective = resolveConfig(config, cmd.optsWithGlobals<ServeOptions>());
      const logger = createLogger(effective.logLevel);
      const db = createDb(effective.dbPath);

      const server = await startServer(createApp({ db, logger }), effective);
      logger.info(`Listening on http://${effective.host}:${effective.port} (database ${effective.dbPath})`);

      const shutdown = (signal: NodeJS.Signals) => {
        logger.info(`Received ${signal}, shutting down`);
        void stopServer(server)
          .catch((err: unknown) => logger.error('Error while closing server', err))
          .finally(() => getRawDb(db).close());
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    }));
}
