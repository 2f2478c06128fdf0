// Core graph data types for the knowledge graph memory server

/** Entity in the knowledge graph */
export interface Entity {
  name: string;
  entityType: string;
  observations: string[];
}

/** Directed relation, identified by its (from, to, relationType) triple */
export interface Relation {
  from: string;
  to: string;
  relationType: string;
}

/** Complete knowledge graph structure */
export interface KnowledgeGraph {
  entities: Entity[];
  relations: Relation[];
}

/** Observations to append to one entity */
export interface ObservationAddition {
  entityName: string;
  contents: string[];
}

/** Observation to remove from one entity */
export interface ObservationDeletion {
  entityName: string;
  observation: string;
}

/** Observations actually appended to one entity */
export interface ObservationAdditionResult {
  entityName: string;
  addedObservations: string[];
}

export type ConflictPolicy = "skip" | "error";

export interface CreateEntitiesOptions {
  /** What to do when an entity name is already taken. Defaults to "skip". */
  onConflict?: ConflictPolicy;
}

export interface GraphStats {
  entityCount: number;
  relationCount: number;
  filePath: string;
}

export function relationKey(relation: Relation): string {
  return JSON.stringify([relation.from, relation.to, relation.relationType]);
}

export function cloneEntity(entity: Entity): Entity {
  return {
    name: entity.name,
    entityType: entity.entityType,
    observations: [...entity.observations],
  };
}

export function cloneRelation(relation: Relation): Relation {
  return {
    from: relation.from,
    to: relation.to,
    relationType: relation.relationType,
  };
}
