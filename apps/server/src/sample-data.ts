import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { taskCreateSchema, type TaskInput } from '@taskapi/core';

/** Bundled sample tasks used by `taskapi seed` */
export const DEFAULT_SAMPLE_FILE = fileURLToPath(new URL('../data/sample-tasks.json', import.meta.url));

const sampleFileSchema = z.array(taskCreateSchema);

/** Read and validate a JSON array of task bodies in the HTTP wire format */
export function loadSampleTasks(file: string = DEFAULT_SAMPLE_FILE): TaskInput[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Could not read sample tasks from ${file}: ${reason}`);
  }

  const result = sampleFileSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map(i => `[${i.path.join('.')}] ${i.message}`);
    throw new Error(`Invalid sample tasks in ${file}: ${problems.join('; ')}`);
  }
  return result.data;
}
