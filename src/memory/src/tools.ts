// MCP tool definitions and dispatch into the knowledge graph
import { z } from 'zod';
import {
  type CallToolResult,
  ErrorCode,
  McpError,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import type { KnowledgeGraphManager } from './knowledge-graph-manager.js';
import type { KnowledgeGraph } from './graph-types.js';
import { MemoryError } from './errors.js';
import {
  EntityRecordSchema,
  RelationRecordSchema,
  encodeEntity,
  encodeRelation,
  decodeEntity,
  decodeRelation,
  formatIssues,
} from './record-codec.js';
import { SERVER_VERSION } from './config.js';

const entityItemSchema = {
  type: "object",
  properties: {
    name: { type: "string", description: "The name of the entity" },
    entity_type: { type: "string", description: "The type of the entity" },
    observations: {
      type: "array",
      items: { type: "string" },
      description: "An array of observation contents associated with the entity"
    },
  },
  required: ["name", "entity_type"],
};

const relationItemSchema = {
  type: "object",
  properties: {
    from_entity: { type: "string", description: "The name of the entity where the relation starts" },
    to_entity: { type: "string", description: "The name of the entity where the relation ends" },
    relation_type: { type: "string", description: "The type of the relation" },
  },
  required: ["from_entity", "to_entity", "relation_type"],
};

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: "create_entities",
    description: "Create multiple new entities in the knowledge graph. Entities whose name already exists are skipped",
    inputSchema: {
      type: "object",
      properties: {
        entities: { type: "array", items: entityItemSchema },
      },
      required: ["entities"],
    },
  },
  {
    name: "create_relations",
    description: "Create multiple new relations between existing entities. Relations should be in active voice",
    inputSchema: {
      type: "object",
      properties: {
        relations: { type: "array", items: relationItemSchema },
      },
      required: ["relations"],
    },
  },
  {
    name: "add_observations",
    description: "Add new observations to existing entities in the knowledge graph",
    inputSchema: {
      type: "object",
      properties: {
        observations: {
          type: "array",
          items: {
            type: "object",
            properties: {
              entity_name: { type: "string", description: "The name of the entity to add the observations to" },
              contents: {
                type: "array",
                items: { type: "string" },
                description: "An array of observation contents to add"
              },
            },
            required: ["entity_name", "contents"],
          },
        },
      },
      required: ["observations"],
    },
  },
  {
    name: "delete_entities",
    description: "Delete multiple entities and their associated relations from the knowledge graph",
    inputSchema: {
      type: "object",
      properties: {
        entity_names: {
          type: "array",
          items: { type: "string" },
          description: "An array of entity names to delete"
        },
      },
      required: ["entity_names"],
    },
  },
  {
    name: "delete_observations",
    description: "Delete specific observations from entities in the knowledge graph",
    inputSchema: {
      type: "object",
      properties: {
        deletions: {
          type: "array",
          items: {
            type: "object",
            properties: {
              entity_name: { type: "string", description: "The name of the entity containing the observation" },
              observation: { type: "string", description: "The observation to delete" },
            },
            required: ["entity_name", "observation"],
          },
        },
      },
      required: ["deletions"],
    },
  },
  {
    name: "delete_relations",
    description: "Delete multiple relations from the knowledge graph",
    inputSchema: {
      type: "object",
      properties: {
        relations: {
          type: "array",
          items: relationItemSchema,
          description: "An array of relations to delete"
        },
      },
      required: ["relations"],
    },
  },
  {
    name: "read_graph",
    description: "Read the entire knowledge graph",
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
  {
    name: "search_nodes",
    description: "Search for nodes in the knowledge graph based on a query",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "The search query to match against entity names, types, and observation content" },
      },
      required: ["query"],
    },
  },
  {
    name: "open_nodes",
    description: "Open specific nodes in the knowledge graph by their names",
    inputSchema: {
      type: "object",
      properties: {
        names: {
          type: "array",
          items: { type: "string" },
          description: "An array of entity names to retrieve",
        },
      },
      required: ["names"],
    },
  },
  {
    name: "get_entities_by_type",
    description: "Get all entities of a specific type",
    inputSchema: {
      type: "object",
      properties: {
        entity_type: { type: "string", description: "The type of entities to retrieve" },
      },
      required: ["entity_type"],
    },
  },
  {
    name: "get_relations_by_type",
    description: "Get all relations of a specific type",
    inputSchema: {
      type: "object",
      properties: {
        relation_type: { type: "string", description: "The type of relations to retrieve" },
      },
      required: ["relation_type"],
    },
  },
  {
    name: "health_check",
    description: "Check if the server is running and can access its resources",
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
];

const CreateEntitiesArgs = z.object({ entities: z.array(EntityRecordSchema) });
const CreateRelationsArgs = z.object({ relations: z.array(RelationRecordSchema) });
const AddObservationsArgs = z.object({
  observations: z.array(z.object({ entity_name: z.string(), contents: z.array(z.string()) })),
});
const DeleteEntitiesArgs = z.object({ entity_names: z.array(z.string()) });
const DeleteObservationsArgs = z.object({
  deletions: z.array(z.object({ entity_name: z.string(), observation: z.string() })),
});
const DeleteRelationsArgs = z.object({ relations: z.array(RelationRecordSchema) });
const SearchNodesArgs = z.object({ query: z.string() });
const OpenNodesArgs = z.object({ names: z.array(z.string()) });
const EntitiesByTypeArgs = z.object({ entity_type: z.string() });
const RelationsByTypeArgs = z.object({ relation_type: z.string() });

function parseArgs<T extends z.ZodTypeAny>(tool: string, schema: T, args: unknown): z.output<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for tool ${tool}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

function jsonResult(value: unknown): CallToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

function encodeGraphResult(graph: KnowledgeGraph) {
  return {
    entities: graph.entities.map(encodeEntity),
    relations: graph.relations.map(encodeRelation),
  };
}

async function dispatch(
  manager: KnowledgeGraphManager,
  name: string,
  args: unknown
): Promise<CallToolResult> {
  switch (name) {
    case "create_entities": {
      const { entities } = parseArgs(name, CreateEntitiesArgs, args);
      const created = await manager.createEntities(entities.map(decodeEntity));
      return jsonResult(created.map(encodeEntity));
    }

    case "create_relations": {
      const { relations } = parseArgs(name, CreateRelationsArgs, args);
      const created = await manager.createRelations(relations.map(decodeRelation));
      return jsonResult(created.map(encodeRelation));
    }

    case "add_observations": {
      const { observations } = parseArgs(name, AddObservationsArgs, args);
      const results = await manager.addObservations(
        observations.map(o => ({ entityName: o.entity_name, contents: o.contents }))
      );
      return jsonResult(results.map(r => ({
        entity_name: r.entityName,
        added_observations: r.addedObservations,
      })));
    }

    case "delete_entities": {
      const { entity_names } = parseArgs(name, DeleteEntitiesArgs, args);
      await manager.deleteEntities(entity_names);
      return textResult("Entities deleted successfully");
    }

    case "delete_observations": {
      const { deletions } = parseArgs(name, DeleteObservationsArgs, args);
      await manager.deleteObservations(
        deletions.map(d => ({ entityName: d.entity_name, observation: d.observation }))
      );
      return textResult("Observations deleted successfully");
    }

    case "delete_relations": {
      const { relations } = parseArgs(name, DeleteRelationsArgs, args);
      await manager.deleteRelations(relations.map(decodeRelation));
      return textResult("Relations deleted successfully");
    }

    case "read_graph":
      return jsonResult(encodeGraphResult(await manager.readGraph()));

    case "search_nodes": {
      const { query } = parseArgs(name, SearchNodesArgs, args);
      return jsonResult(encodeGraphResult(await manager.searchNodes(query)));
    }

    case "open_nodes": {
      const { names } = parseArgs(name, OpenNodesArgs, args);
      return jsonResult(encodeGraphResult(await manager.openNodes(names)));
    }

    case "get_entities_by_type": {
      const { entity_type } = parseArgs(name, EntitiesByTypeArgs, args);
      const entities = await manager.getEntitiesByType(entity_type);
      return jsonResult(entities.map(encodeEntity));
    }

    case "get_relations_by_type": {
      const { relation_type } = parseArgs(name, RelationsByTypeArgs, args);
      const relations = await manager.getRelationsByType(relation_type);
      return jsonResult(relations.map(encodeRelation));
    }

    case "health_check": {
      const stats = await manager.getStats();
      return jsonResult({
        status: "ok",
        memory_file_path: stats.filePath,
        entity_count: stats.entityCount,
        relation_count: stats.relationCount,
        version: SERVER_VERSION,
      });
    }

    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }
}

/**
 * Runs one tool call. Graph errors are reported to the client as tool
 * errors; protocol errors and anything unexpected propagate.
 */
export async function handleToolCall(
  manager: KnowledgeGraphManager,
  name: string,
  args: unknown
): Promise<CallToolResult> {
  try {
    return await dispatch(manager, name, args);
  } catch (error) {
    if (error instanceof MemoryError) {
      console.error(`Tool ${name} failed:`, error.message);
      return {
        isError: true,
        content: [{ type: "text", text: `${error.kind}: ${error.message}` }],
      };
    }
    throw error;
  }
}
