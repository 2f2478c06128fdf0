import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ErrorCode, McpError, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { KnowledgeGraphManager } from './knowledge-graph-manager.js';
import type { GraphStore } from './storage-manager.js';
import type { KnowledgeGraph } from './graph-types.js';
import { TOOL_DEFINITIONS, handleToolCall } from './tools.js';

class MemoryStore implements GraphStore {
  graph: KnowledgeGraph = { entities: [], relations: [] };

  getFilePath(): string {
    return '/virtual/tools.jsonl';
  }

  async load(): Promise<KnowledgeGraph> {
    return structuredClone(this.graph);
  }

  async save(graph: KnowledgeGraph): Promise<void> {
    this.graph = structuredClone(graph);
  }
}

function text(result: CallToolResult): string {
  const [first] = result.content;
  if (first?.type !== 'text') {
    throw new Error('expected a text result');
  }
  return first.text;
}

function json(result: CallToolResult): unknown {
  return JSON.parse(text(result));
}

describe('handleToolCall', () => {
  let store: MemoryStore;
  let manager: KnowledgeGraphManager;

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    store = new MemoryStore();
    manager = new KnowledgeGraphManager(store);
    await handleToolCall(manager, 'create_entities', {
      entities: [
        { name: 'a', entity_type: 'person', observations: ['x'] },
        { name: 'b', entity_type: 'person' },
      ],
    });
    await handleToolCall(manager, 'create_relations', {
      relations: [{ from_entity: 'a', to_entity: 'b', relation_type: 'knows' }],
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists a definition for every tool it dispatches', () => {
    expect(TOOL_DEFINITIONS.map(t => t.name)).toEqual([
      'create_entities',
      'create_relations',
      'add_observations',
      'delete_entities',
      'delete_observations',
      'delete_relations',
      'read_graph',
      'search_nodes',
      'open_nodes',
      'get_entities_by_type',
      'get_relations_by_type',
      'health_check',
    ]);
  });

  it('returns only the entities actually created', async () => {
    const result = await handleToolCall(manager, 'create_entities', {
      entities: [
        { name: 'a', entity_type: 'person', observations: [] },
        { name: 'c', entity_type: 'place', observations: ['sunny'] },
      ],
    });
    expect(json(result)).toEqual([{ name: 'c', entity_type: 'place', observations: ['sunny'] }]);
  });

  it('reads the graph in wire shape', async () => {
    expect(json(await handleToolCall(manager, 'read_graph', undefined))).toEqual({
      entities: [
        { name: 'a', entity_type: 'person', observations: ['x'] },
        { name: 'b', entity_type: 'person', observations: [] },
      ],
      relations: [{ from_entity: 'a', to_entity: 'b', relation_type: 'knows' }],
    });
  });

  it('reports added observations per entity', async () => {
    const result = await handleToolCall(manager, 'add_observations', {
      observations: [{ entity_name: 'a', contents: ['x', 'y'] }],
    });
    expect(json(result)).toEqual([{ entity_name: 'a', added_observations: ['y'] }]);
  });

  it('searches and opens nodes', async () => {
    expect(json(await handleToolCall(manager, 'search_nodes', { query: 'X' }))).toEqual({
      entities: [{ name: 'a', entity_type: 'person', observations: ['x'] }],
      relations: [],
    });
    expect(json(await handleToolCall(manager, 'open_nodes', { names: ['a', 'b'] }))).toEqual({
      entities: [
        { name: 'a', entity_type: 'person', observations: ['x'] },
        { name: 'b', entity_type: 'person', observations: [] },
      ],
      relations: [{ from_entity: 'a', to_entity: 'b', relation_type: 'knows' }],
    });
  });

  it('runs the delete tools', async () => {
    expect(text(await handleToolCall(manager, 'delete_observations', {
      deletions: [{ entity_name: 'a', observation: 'x' }],
    }))).toBe('Observations deleted successfully');
    expect(text(await handleToolCall(manager, 'delete_relations', {
      relations: [{ from_entity: 'a', to_entity: 'b', relation_type: 'knows' }],
    }))).toBe('Relations deleted successfully');
    expect(text(await handleToolCall(manager, 'delete_entities', { entity_names: ['b'] }))).toBe(
      'Entities deleted successfully'
    );

    expect(store.graph).toEqual({
      entities: [{ name: 'a', entityType: 'person', observations: [] }],
      relations: [],
    });
  });

  it('looks up entities and relations by type', async () => {
    expect(json(await handleToolCall(manager, 'get_entities_by_type', { entity_type: 'person' }))).toHaveLength(2);
    expect(json(await handleToolCall(manager, 'get_relations_by_type', { relation_type: 'knows' }))).toEqual([
      { from_entity: 'a', to_entity: 'b', relation_type: 'knows' },
    ]);
  });

  it('reports health with graph counts', async () => {
    expect(json(await handleToolCall(manager, 'health_check', {}))).toEqual({
      status: 'ok',
      memory_file_path: '/virtual/tools.jsonl',
      entity_count: 2,
      relation_count: 1,
      version: '0.1.0',
    });
  });

  it('turns graph errors into tool errors', async () => {
    const result = await handleToolCall(manager, 'create_relations', {
      relations: [{ from_entity: 'ghost', to_entity: 'b', relation_type: 'knows' }],
    });
    expect(result.isError).toBe(true);
    expect(text(result)).toBe('NotFound: create_relations: entity "ghost" not found');
    expect(store.graph.relations).toHaveLength(1);
  });

  it('rejects malformed arguments as invalid params', async () => {
    const call = handleToolCall(manager, 'create_entities', { entities: [{ name: 'a' }] });
    await expect(call).rejects.toBeInstanceOf(McpError);
    await expect(call).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
  });

  it('rejects missing arguments', async () => {
    await expect(handleToolCall(manager, 'search_nodes', undefined)).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
  });

  it('rejects unknown tools', async () => {
    await expect(handleToolCall(manager, 'drop_everything', {})).rejects.toMatchObject({
      code: ErrorCode.MethodNotFound,
    });
  });
});
