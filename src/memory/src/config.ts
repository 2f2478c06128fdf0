// Server configuration resolved from the environment
import path from 'path';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import { formatIssues } from './record-codec.js';

export const SERVER_NAME = "graph-memory-server";
export const SERVER_VERSION = "0.1.0";

export const DEFAULT_MEMORY_FILE_NAME = "memory.jsonl";
export const DEFAULT_MEMORY_FILE_PATH = ".";

const MemoryEnvSchema = z.object({
  MEMORY_FILE_NAME: z.string().min(1).default(DEFAULT_MEMORY_FILE_NAME),
  MEMORY_FILE_PATH: z.string().min(1).default(DEFAULT_MEMORY_FILE_PATH),
  LOCAL_STORAGE: z
    .string()
    .optional()
    .transform(value => value?.trim().toLowerCase() === "true"),
});

export interface MemoryConfig {
  /** Absolute path of the JSONL file backing the graph */
  memoryFilePath: string;
  /** True when the file lives in the working directory regardless of MEMORY_FILE_PATH */
  localStorage: boolean;
}

/**
 * Combines MEMORY_FILE_PATH (base directory) and MEMORY_FILE_NAME into the
 * backing file path. With LOCAL_STORAGE=true the base directory is `cwd`.
 * Relative directories resolve against `cwd`.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): MemoryConfig {
  const parsed = MemoryEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError("configure", `invalid environment (${formatIssues(parsed.error)})`);
  }

  const { MEMORY_FILE_NAME, MEMORY_FILE_PATH, LOCAL_STORAGE } = parsed.data;
  const baseDirectory = LOCAL_STORAGE ? cwd : path.resolve(cwd, MEMORY_FILE_PATH);

  return {
    memoryFilePath: path.join(baseDirectory, MEMORY_FILE_NAME),
    localStorage: LOCAL_STORAGE,
  };
}
