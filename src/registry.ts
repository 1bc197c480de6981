import fs from 'fs-extra';
import path from 'path';
import { pathToFileURL } from 'url';
import { formatTaskName, parseTaskName } from './config';
import type { Candidate, Resolution } from './types';

/**
 * Source of candidate implementations, one per task identifier.
 */
export interface ImplementationRegistry {
  /** Ascending identifiers that have a registration, callable or not */
  listAttempted(): Promise<number[]>;
  resolve(taskId: number): Promise<Resolution>;
}

/**
 * Score a task receives if every example is correct: shorter sources score higher.
 */
export function computeTentativeScore(size: number, maxTaskScore: number): number {
  return Math.max(1, maxTaskScore - size);
}

function isCandidate(value: unknown): value is Candidate {
  return typeof value === 'function';
}

/**
 * Solution module extensions, in lookup order
 */
export const SOLUTION_EXTENSIONS = ['.ts', '.mts', '.js', '.mjs'] as const;

export interface FileSystemRegistryOptions {
  solutionsDir: string;
  functionName: string;
  maxTaskScore: number;
  numTasks: number;
}

/**
 * Resolves `<solutionsDir>/taskNNN.<ext>` and takes its `functionName` export.
 *
 * Size is the byte size of the file on disk. A module that throws while it
 * is being imported is reported as a load failure and ends the run.
 */
export class FileSystemRegistry implements ImplementationRegistry {
  constructor(private readonly options: FileSystemRegistryOptions) {}

  async findSolutionFile(taskId: number): Promise<string | undefined> {
    const name = formatTaskName(taskId);
    for (const extension of SOLUTION_EXTENSIONS) {
      const filePath = path.join(this.options.solutionsDir, `${name}${extension}`);
      if (await fs.pathExists(filePath)) {
        return filePath;
      }
    }
    return undefined;
  }

  async listAttempted(): Promise<number[]> {
    if (!(await fs.pathExists(this.options.solutionsDir))) {
      return [];
    }

    const entries = await fs.readdir(this.options.solutionsDir);
    const taskIds = new Set<number>();

    for (const entry of entries) {
      const extension = path.extname(entry);
      if (!SOLUTION_EXTENSIONS.some((known) => known === extension)) continue;
      // Type declarations are not solutions
      if (entry.endsWith('.d.ts') || entry.endsWith('.d.mts')) continue;

      const taskId = parseTaskName(path.basename(entry, extension));
      if (taskId === undefined || taskId < 1 || taskId > this.options.numTasks) {
        console.warn(`Skipping ${entry}: not named after a task between 1 and ${this.options.numTasks}`);
        continue;
      }
      taskIds.add(taskId);
    }

    return [...taskIds].sort((a, b) => a - b);
  }

  async resolve(taskId: number): Promise<Resolution> {
    const filePath = await this.findSolutionFile(taskId);
    if (!filePath) {
      return { status: 'not-found', reason: `No solution file for ${formatTaskName(taskId)}` };
    }

    let exports: Record<string, unknown>;
    try {
      exports = await import(pathToFileURL(path.resolve(filePath)).href);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load solution module ${filePath}: ${errorMessage}`, { cause: error });
    }

    const candidate = exports[this.options.functionName];
    if (!isCandidate(candidate)) {
      return {
        status: 'not-found',
        reason: `${filePath} does not export a function named "${this.options.functionName}"`,
      };
    }

    const { size } = await fs.stat(filePath);
    return {
      status: 'found',
      candidate,
      size,
      tentativeScore: computeTentativeScore(size, this.options.maxTaskScore),
    };
  }
}

interface Registration {
  value: unknown;
  source: string | undefined;
}

/**
 * Registry backed by a map, for programmatic use and tests.
 *
 * Size is the UTF-8 byte length of the registered source, or of the
 * function's own text when no source is given.
 */
export class InMemoryRegistry implements ImplementationRegistry {
  private readonly registrations = new Map<number, Registration>();

  constructor(private readonly maxTaskScore: number) {}

  /**
   * Registers anything under a task identifier. Non-callable values are
   * accepted here and surface as `not-found` on resolution.
   */
  register(taskId: number, value: unknown, source?: string): this {
    this.registrations.set(taskId, { value, source });
    return this;
  }

  async listAttempted(): Promise<number[]> {
    return [...this.registrations.keys()].sort((a, b) => a - b);
  }

  async resolve(taskId: number): Promise<Resolution> {
    const registration = this.registrations.get(taskId);
    if (!registration) {
      return { status: 'not-found', reason: `No candidate registered for ${formatTaskName(taskId)}` };
    }

    const { value, source } = registration;
    if (!isCandidate(value)) {
      return { status: 'not-found', reason: `Registration for ${formatTaskName(taskId)} is not a function` };
    }

    const size = Buffer.byteLength(source ?? value.toString(), 'utf8');
    return {
      status: 'found',
      candidate: value,
      size,
      tentativeScore: computeTentativeScore(size, this.maxTaskScore),
    };
  }
}
