// Knowledge Graph Manager: in-memory index over the persisted graph
import { Mutex } from 'async-mutex';
import type { GraphStore } from './storage-manager.js';
import {
  type Entity,
  type Relation,
  type KnowledgeGraph,
  type ObservationAddition,
  type ObservationAdditionResult,
  type ObservationDeletion,
  type CreateEntitiesOptions,
  type GraphStats,
  relationKey,
  cloneEntity,
  cloneRelation,
} from './graph-types.js';
import { DuplicateError, NotFoundError, ValidationError } from './errors.js';

interface GraphState {
  entities: Map<string, Entity>;
  relations: Relation[];
}

function toState(graph: KnowledgeGraph): GraphState {
  const entities = new Map<string, Entity>();
  for (const entity of graph.entities) {
    entities.set(entity.name, cloneEntity(entity));
  }
  return { entities, relations: graph.relations.map(cloneRelation) };
}

function toGraph(state: GraphState): KnowledgeGraph {
  return {
    entities: Array.from(state.entities.values(), cloneEntity),
    relations: state.relations.map(cloneRelation),
  };
}

function uniqueStrings(values: string[]): string[] {
  return Array.from(new Set(values));
}

function validateEntity(operation: string, entity: Entity): void {
  if (entity.name.length === 0) {
    throw new ValidationError(operation, "entity name must not be empty");
  }
  if (entity.entityType.length === 0) {
    throw new ValidationError(operation, `entity "${entity.name}" has an empty type`, entity.name);
  }
}

function validateRelation(operation: string, relation: Relation): void {
  if (relation.from.length === 0 || relation.to.length === 0 || relation.relationType.length === 0) {
    throw new ValidationError(
      operation,
      "relation endpoints and type must not be empty",
      relationKey(relation)
    );
  }
}

/**
 * Owns the entity map and relation list and keeps them in step with storage.
 *
 * Every mutation runs under one mutex, applies its whole batch to a draft
 * copy, saves the draft, and only then makes it the current state. A batch
 * that fails validation or fails to save leaves the current state as it was.
 */
export class KnowledgeGraphManager {
  private readonly store: GraphStore;
  private readonly mutex = new Mutex();
  private state: GraphState | null = null;
  private loading: Promise<GraphState> | null = null;

  constructor(store: GraphStore) {
    this.store = store;
  }

  /**
   * Gets the current memory file path
   */
  getMemoryFilePath(): string {
    return this.store.getFilePath();
  }

  /**
   * Loads the graph on first use. A failed load is retried by the next call.
   */
  private async ensureLoaded(): Promise<GraphState> {
    if (this.state) {
      return this.state;
    }
    if (!this.loading) {
      this.loading = this.store
        .load()
        .then(graph => {
          const state = toState(graph);
          this.state = state;
          return state;
        })
        .finally(() => {
          this.loading = null;
        });
    }
    return this.loading;
  }

  private async mutate<T>(apply: (draft: GraphState) => T): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const current = await this.ensureLoaded();
      const draft = toState(toGraph(current));
      const result = apply(draft);
      await this.store.save(toGraph(draft));
      this.state = draft;
      return result;
    });
  }

  /**
   * Creates multiple entities, skipping names that already exist unless
   * `onConflict` is "error".
   */
  async createEntities(entities: Entity[], options: CreateEntitiesOptions = {}): Promise<Entity[]> {
    const onConflict = options.onConflict ?? "skip";
    entities.forEach(entity => validateEntity("create_entities", entity));

    return this.mutate(draft => {
      const created: Entity[] = [];
      for (const entity of entities) {
        if (draft.entities.has(entity.name)) {
          if (onConflict === "error") {
            throw new DuplicateError("create_entities", entity.name);
          }
          continue;
        }
        const stored: Entity = {
          name: entity.name,
          entityType: entity.entityType,
          observations: uniqueStrings(entity.observations),
        };
        draft.entities.set(stored.name, stored);
        created.push(cloneEntity(stored));
      }
      return created;
    });
  }

  /**
   * Deletes entities and every relation that touches them
   */
  async deleteEntities(entityNames: string[]): Promise<void> {
    const doomed = new Set(entityNames);
    await this.mutate(draft => {
      for (const name of doomed) {
        draft.entities.delete(name);
      }
      draft.relations = draft.relations.filter(r => !doomed.has(r.from) && !doomed.has(r.to));
    });
  }

  /**
   * Adds observations to entities. An unknown entity fails the whole batch.
   */
  async addObservations(additions: ObservationAddition[]): Promise<ObservationAdditionResult[]> {
    return this.mutate(draft => {
      const results: ObservationAdditionResult[] = [];
      for (const addition of additions) {
        const entity = draft.entities.get(addition.entityName);
        if (!entity) {
          throw new NotFoundError("add_observations", addition.entityName);
        }

        const addedObservations: string[] = [];
        for (const content of addition.contents) {
          if (!entity.observations.includes(content)) {
            entity.observations.push(content);
            addedObservations.push(content);
          }
        }
        results.push({ entityName: addition.entityName, addedObservations });
      }
      return results;
    });
  }

  /**
   * Deletes observations from entities. Unknown entities and observations
   * are ignored.
   */
  async deleteObservations(deletions: ObservationDeletion[]): Promise<void> {
    await this.mutate(draft => {
      for (const deletion of deletions) {
        const entity = draft.entities.get(deletion.entityName);
        if (!entity) {
          continue;
        }
        entity.observations = entity.observations.filter(o => o !== deletion.observation);
      }
    });
  }

  /**
   * Creates relations between existing entities. Both endpoints must exist;
   * triples already present are skipped.
   */
  async createRelations(relations: Relation[]): Promise<Relation[]> {
    relations.forEach(relation => validateRelation("create_relations", relation));

    return this.mutate(draft => {
      const existing = new Set(draft.relations.map(relationKey));
      const created: Relation[] = [];
      for (const relation of relations) {
        for (const endpoint of [relation.from, relation.to]) {
          if (!draft.entities.has(endpoint)) {
            throw new NotFoundError("create_relations", endpoint);
          }
        }

        const key = relationKey(relation);
        if (existing.has(key)) {
          continue;
        }
        existing.add(key);
        const stored = cloneRelation(relation);
        draft.relations.push(stored);
        created.push(cloneRelation(stored));
      }
      return created;
    });
  }

  /**
   * Deletes relations matching the exact triple
   */
  async deleteRelations(relations: Relation[]): Promise<void> {
    const doomed = new Set(relations.map(relationKey));
    await this.mutate(draft => {
      draft.relations = draft.relations.filter(r => !doomed.has(relationKey(r)));
    });
  }

  /**
   * Reads the entire graph as a detached copy
   */
  async readGraph(): Promise<KnowledgeGraph> {
    return toGraph(await this.ensureLoaded());
  }

  /**
   * Case-insensitive substring search over names, types and observations.
   * Only relations with both endpoints in the result are returned. A blank
   * query matches nothing.
   */
  async searchNodes(query: string): Promise<KnowledgeGraph> {
    const state = await this.ensureLoaded();
    if (query.trim() === "") {
      return { entities: [], relations: [] };
    }

    const needle = query.toLowerCase();
    const entities = Array.from(state.entities.values()).filter(e =>
      e.name.toLowerCase().includes(needle) ||
      e.entityType.toLowerCase().includes(needle) ||
      e.observations.some(o => o.toLowerCase().includes(needle))
    );

    return this.subgraph(state, entities);
  }

  /**
   * Opens specific nodes by name, in request order. Unknown names are skipped.
   */
  async openNodes(names: string[]): Promise<KnowledgeGraph> {
    const state = await this.ensureLoaded();
    const entities: Entity[] = [];
    for (const name of uniqueStrings(names)) {
      const entity = state.entities.get(name);
      if (entity) {
        entities.push(entity);
      }
    }

    return this.subgraph(state, entities);
  }

  /**
   * Gets all entities of a type (case-insensitive)
   */
  async getEntitiesByType(entityType: string): Promise<Entity[]> {
    const state = await this.ensureLoaded();
    const wanted = entityType.toLowerCase();
    return Array.from(state.entities.values())
      .filter(e => e.entityType.toLowerCase() === wanted)
      .map(cloneEntity);
  }

  /**
   * Gets all relations of a type
   */
  async getRelationsByType(relationType: string): Promise<Relation[]> {
    const state = await this.ensureLoaded();
    return state.relations.filter(r => r.relationType === relationType).map(cloneRelation);
  }

  async getStats(): Promise<GraphStats> {
    const state = await this.ensureLoaded();
    return {
      entityCount: state.entities.size,
      relationCount: state.relations.length,
      filePath: this.getMemoryFilePath(),
    };
  }

  private subgraph(state: GraphState, entities: Entity[]): KnowledgeGraph {
    const names = new Set(entities.map(e => e.name));
    return {
      entities: entities.map(cloneEntity),
      relations: state.relations
        .filter(r => names.has(r.from) && names.has(r.to))
        .map(cloneRelation),
    };
  }
}
