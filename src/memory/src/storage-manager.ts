// Storage manager for the line-delimited graph file
import { promises as fs } from 'fs';
import path from 'path';
import { randomBytes } from 'crypto';
import type { KnowledgeGraph } from './graph-types.js';
import { decodeGraph, encodeGraph } from './record-codec.js';
import { StorageError } from './errors.js';

/**
 * Persistence seam used by the knowledge graph manager.
 * Implementations hold no graph state between calls.
 */
export interface GraphStore {
  getFilePath(): string;
  load(): Promise<KnowledgeGraph>;
  save(graph: KnowledgeGraph): Promise<void>;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Reads and writes the complete knowledge graph as JSONL.
 *
 * Saves never touch the live file until the new content is fully on disk:
 * the graph is written to a temporary sibling, synced, then renamed over
 * the target.
 */
export class StorageManager implements GraphStore {
  private readonly memoryFilePath: string;

  constructor(memoryFilePath: string) {
    this.memoryFilePath = memoryFilePath;
  }

  /**
   * Gets the current memory file path
   */
  getFilePath(): string {
    return this.memoryFilePath;
  }

  /**
   * Loads the complete graph. A missing file is an empty graph.
   */
  async load(): Promise<KnowledgeGraph> {
    let data: string;
    try {
      data = await fs.readFile(this.memoryFilePath, "utf-8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return { entities: [], relations: [] };
      }
      throw new StorageError("load", this.memoryFilePath, error);
    }

    return decodeGraph(data, this.memoryFilePath);
  }

  /**
   * Replaces the file with the given graph
   */
  async save(graph: KnowledgeGraph): Promise<void> {
    const content = encodeGraph(graph);
    const directory = path.dirname(this.memoryFilePath);
    const tmpPath = path.join(
      directory,
      `.${path.basename(this.memoryFilePath)}.${process.pid}.${randomBytes(6).toString("hex")}.tmp`
    );

    try {
      await fs.mkdir(directory, { recursive: true });
      const handle = await fs.open(tmpPath, "w");
      try {
        await handle.writeFile(content, "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmpPath, this.memoryFilePath);
    } catch (error) {
      await this.removeTempFile(tmpPath);
      throw new StorageError("save", this.memoryFilePath, error);
    }
  }

  private async removeTempFile(tmpPath: string): Promise<void> {
    try {
      await fs.rm(tmpPath, { force: true });
    } catch (cleanupError) {
      console.error(`Failed to remove temporary file ${tmpPath}:`, cleanupError);
    }
  }
}
