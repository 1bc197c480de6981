import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { formatTaskName } from './config';
import type { Example, Task } from './types';

const CellSchema = z.number().int().min(0).max(9);

const GridSchema = z
  .array(z.array(CellSchema))
  .refine((rows) => rows.every((row) => row.length === (rows[0]?.length ?? 0)), {
    message: 'grid rows must all have the same length',
  });

const ExampleSchema = z.object({
  input: GridSchema,
  output: GridSchema,
});

export const TaskFileSchema = z.object({
  train: z.array(ExampleSchema),
  test: z.array(ExampleSchema),
  'arc-gen': z.array(ExampleSchema),
});

export type TaskFile = z.infer<typeof TaskFileSchema>;

/**
 * Example groups in grading order
 */
export const EXAMPLE_GROUPS = ['train', 'test', 'arc-gen'] as const;

/**
 * Concatenates the example groups of a task file into the flat grading sequence
 */
export function flattenExamples(taskFile: TaskFile): Example[] {
  return EXAMPLE_GROUPS.flatMap((group) => taskFile[group]);
}

/**
 * Parses already-loaded JSON into a task.
 * @throws Error listing every schema violation
 */
export function parseTask(taskId: number, json: unknown): Task {
  const name = formatTaskName(taskId);
  const parsed = TaskFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid task data for ${name}: ${issues}`);
  }

  return {
    taskId,
    name,
    examples: flattenExamples(parsed.data),
  };
}

export type TaskLoader = (taskId: number) => Promise<Task>;

/**
 * Creates a loader that reads `<dataDir>/taskNNN.json`.
 * Read and parse failures are not recovered: they end the run.
 */
export function createTaskLoader(dataDir: string): TaskLoader {
  return async (taskId: number): Promise<Task> => {
    const filePath = path.join(dataDir, `${formatTaskName(taskId)}.json`);

    let json: unknown;
    try {
      json = await fs.readJson(filePath);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load task data from ${filePath}: ${errorMessage}`, { cause: error });
    }

    return parseTask(taskId, json);
  };
}
