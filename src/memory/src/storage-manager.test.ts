import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { StorageManager } from './storage-manager.js';
import { FormatError, StorageError } from './errors.js';
import type { KnowledgeGraph } from './graph-types.js';

const graph: KnowledgeGraph = {
  entities: [
    { name: 'alice', entityType: 'person', observations: ['likes tea'] },
    { name: 'acme', entityType: 'organization', observations: [] },
  ],
  relations: [{ from: 'alice', to: 'acme', relationType: 'works_at' }],
};

describe('StorageManager', () => {
  let directory: string;
  let filePath: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'graph-storage-'));
    filePath = path.join(directory, 'memory.jsonl');
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('loads an empty graph when the file does not exist', async () => {
    const storage = new StorageManager(filePath);
    await expect(storage.load()).resolves.toEqual({ entities: [], relations: [] });
  });

  it('round-trips a saved graph', async () => {
    const storage = new StorageManager(filePath);
    await storage.save(graph);
    await expect(storage.load()).resolves.toEqual(graph);
  });

  it('writes the same bytes after a load and save cycle', async () => {
    const storage = new StorageManager(filePath);
    await storage.save(graph);
    const first = await fs.readFile(filePath, 'utf-8');

    await storage.save(await storage.load());
    const second = await fs.readFile(filePath, 'utf-8');

    expect(second).toBe(first);
  });

  it('creates missing parent directories', async () => {
    const nested = path.join(directory, 'a', 'b', 'memory.jsonl');
    const storage = new StorageManager(nested);
    await storage.save(graph);
    await expect(new StorageManager(nested).load()).resolves.toEqual(graph);
  });

  it('leaves no temporary files behind', async () => {
    const storage = new StorageManager(filePath);
    await storage.save(graph);
    await storage.save({ entities: [], relations: [] });
    expect(await fs.readdir(directory)).toEqual(['memory.jsonl']);
  });

  it('aborts the load on a malformed line', async () => {
    await fs.writeFile(
      filePath,
      '{"name":"alice","entity_type":"person","observations":[]}\n{"oops":true}\n'
    );
    const storage = new StorageManager(filePath);
    const error = await storage.load().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FormatError);
    expect(error).toMatchObject({ kind: 'Format', key: `${filePath}:2` });
  });

  it('wraps I/O failures in a StorageError', async () => {
    // A directory in place of the target makes both read and rename fail
    await fs.mkdir(filePath);
    const storage = new StorageManager(filePath);

    await expect(storage.load()).rejects.toBeInstanceOf(StorageError);
    await expect(storage.save(graph)).rejects.toMatchObject({ kind: 'Storage', operation: 'save' });
    expect(await fs.readdir(directory)).toEqual(['memory.jsonl']);
  });

  it('keeps the previous file when a save fails', async () => {
    const storage = new StorageManager(filePath);
    await storage.save(graph);
    const before = await fs.readFile(filePath, 'utf-8');

    // Saving into a path under a regular file cannot create its directory
    const blocked = new StorageManager(path.join(filePath, 'child.jsonl'));
    await expect(blocked.save(graph)).rejects.toBeInstanceOf(StorageError);

    expect(await fs.readFile(filePath, 'utf-8')).toBe(before);
  });
});
