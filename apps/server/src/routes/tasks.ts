import { Router } from 'express';
import type { z } from 'zod';
import {
  createTask,
  deleteTask,
  getTaskById,
  listTasks,
  patchTask,
  replaceTask,
  taskCreateSchema,
  taskParamsSchema,
  taskPatchSchema,
  taskQuerySchema,
  validate,
} from '@taskapi/core';
import type { IssueLocation, TaskDb } from '@taskapi/core';
import { TaskNotFoundError, ValidationError } from '../errors.js';
import { toTaskResponse } from '../serializers.js';

/** Validate or throw a ValidationError carrying every offending field */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  location: IssueLocation,
): z.output<S> {
  const result = validate(schema, value, location);
  if (result.type === 'invalid') throw new ValidationError(result.issues);
  return result.data;
}

export function createTasksRouter(db: TaskDb): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const input = parseOrThrow(taskCreateSchema, req.body, 'body');
    const task = createTask(db, input);
    res.status(201).json(toTaskResponse(task));
  });

  router.get('/', (req, res) => {
    const query = parseOrThrow(taskQuerySchema, req.query, 'query');
    res.json(listTasks(db, query).map(toTaskResponse));
  });

  router.get('/:task_id', (req, res) => {
    const { task_id } = parseOrThrow(taskParamsSchema, req.params, 'path');
    const task = getTaskById(db, task_id);
    if (!task) throw new TaskNotFoundError(task_id);
    res.json(toTaskResponse(task));
  });

  router.put('/:task_id', (req, res) => {
    const { task_id } = parseOrThrow(taskParamsSchema, req.params, 'path');
    const input = parseOrThrow(taskCreateSchema, req.body, 'body');
    const task = replaceTask(db, task_id, input);
    if (!task) throw new TaskNotFoundError(task_id);
    res.json(toTaskResponse(task));
  });

  router.patch('/:task_id', (req, res) => {
    const { task_id } = parseOrThrow(taskParamsSchema, req.params, 'path');
    const patch = parseOrThrow(taskPatchSchema, req.body, 'body');
    const task = patchTask(db, task_id, patch);
    if (!task) throw new TaskNotFoundError(task_id);
    res.json(toTaskResponse(task));
  });

  router.delete('/:task_id', (req, res) => {
    const { task_id } = parseOrThrow(taskParamsSchema, req.params, 'path');
    if (!deleteTask(db, task_id)) throw new TaskNotFoundError(task_id);
    res.status(204).end();
  });

  return router;
}
