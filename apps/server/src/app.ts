import express, { type Express } from 'express';
import type { TaskDb } from '@taskapi/core';
import type { Logger } from './log.js';
import { createTasksRouter } from './routes/tasks.js';
import { errorHandler, notFoundHandler, requestLogger } from './middleware.js';

export interface AppDeps {
  db: TaskDb;
  logger: Logger;
}

export function createApp({ db, logger }: AppDeps): Express {
  const app = express();

  app.disable('x-powered-by');
  // Repeated keys become arrays, which the query schema rejects; no nested objects
  app.set('query parser', 'simple');

  app.use(requestLogger(logger));
  app.use(express.json());

  app.get('/', (_req, res) => {
    res.json({ message: 'Task Management API', status: 'running' });
  });
  app.use('/api/tasks', createTasksRouter(db));

  app.use(notFoundHandler);
  app.use(errorHandler(logger));

  return app;
}
