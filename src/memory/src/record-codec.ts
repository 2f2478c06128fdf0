// Line-delimited JSON codec for persisted graph records
import { z } from 'zod';
import type { Entity, Relation, KnowledgeGraph } from './graph-types.js';
import { FormatError } from './errors.js';

/** Persisted/wire shape of an entity */
export const EntityRecordSchema = z.object({
  name: z.string().min(1),
  entity_type: z.string().min(1),
  observations: z.array(z.string()).default([]),
});

/** Persisted/wire shape of a relation */
export const RelationRecordSchema = z.object({
  from_entity: z.string().min(1),
  to_entity: z.string().min(1),
  relation_type: z.string().min(1),
});

export type EntityRecord = z.output<typeof EntityRecordSchema>;
export type RelationRecord = z.output<typeof RelationRecordSchema>;

/** A decoded line, tagged by the variant its field shape selected */
export type GraphRecord =
  | { kind: "entity"; entity: Entity }
  | { kind: "relation"; relation: Relation };

const ENTITY_FIELDS = ["entity_type", "observations"] as const;
const RELATION_FIELDS = ["from_entity", "to_entity"] as const;

export function encodeEntity(entity: Entity): EntityRecord {
  return {
    name: entity.name,
    entity_type: entity.entityType,
    observations: [...entity.observations],
  };
}

export function decodeEntity(record: EntityRecord): Entity {
  return {
    name: record.name,
    entityType: record.entity_type,
    observations: [...record.observations],
  };
}

export function encodeRelation(relation: Relation): RelationRecord {
  return {
    from_entity: relation.from,
    to_entity: relation.to,
    relation_type: relation.relationType,
  };
}

export function decodeRelation(record: RelationRecord): Relation {
  return {
    from: record.from_entity,
    to: record.to_entity,
    relationType: record.relation_type,
  };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Decodes one JSONL line. The variant is chosen from the fields present:
 * `entity_type`/`observations` select an entity, `from_entity`/`to_entity`
 * a relation. A line carrying both or neither set is rejected.
 */
export function decodeLine(line: string, location: string): GraphRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    throw new FormatError("load", location, "line is not valid JSON", error);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new FormatError("load", location, "record is not a JSON object");
  }

  const record = parsed;
  const looksLikeEntity = ENTITY_FIELDS.some(field => field in record);
  const looksLikeRelation = RELATION_FIELDS.some(field => field in record);

  if (looksLikeEntity && looksLikeRelation) {
    throw new FormatError("load", location, "record has both entity and relation fields");
  }

  if (looksLikeEntity) {
    const result = EntityRecordSchema.safeParse(record);
    if (!result.success) {
      throw new FormatError("load", location, `invalid entity record (${formatIssues(result.error)})`);
    }
    return { kind: "entity", entity: decodeEntity(result.data) };
  }

  if (looksLikeRelation) {
    const result = RelationRecordSchema.safeParse(record);
    if (!result.success) {
      throw new FormatError("load", location, `invalid relation record (${formatIssues(result.error)})`);
    }
    return { kind: "relation", relation: decodeRelation(result.data) };
  }

  throw new FormatError("load", location, "record is neither an entity nor a relation");
}

/**
 * Parses a whole JSONL document. Blank lines are skipped; the first bad
 * record aborts the parse.
 */
export function decodeGraph(data: string, source: string): KnowledgeGraph {
  const graph: KnowledgeGraph = { entities: [], relations: [] };
  const seenNames = new Set<string>();

  data.split("\n").forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === "") {
      return;
    }

    const location = `${source}:${index + 1}`;
    const record = decodeLine(line, location);

    if (record.kind === "entity") {
      if (seenNames.has(record.entity.name)) {
        throw new FormatError("load", location, `duplicate entity "${record.entity.name}"`);
      }
      seenNames.add(record.entity.name);
      graph.entities.push(record.entity);
    } else {
      graph.relations.push(record.relation);
    }
  });

  return graph;
}

/** Serializes entities then relations, one record per line */
export function encodeGraph(graph: KnowledgeGraph): string {
  const lines = [
    ...graph.entities.map(entity => JSON.stringify(encodeEntity(entity))),
    ...graph.relations.map(relation => JSON.stringify(encodeRelation(relation))),
  ];
  return lines.map(line => `${line}\n`).join("");
}
