#!/usr/bin/env node

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { KnowledgeGraphManager } from './src/knowledge-graph-manager.js';
import { StorageManager } from './src/storage-manager.js';
import { loadConfig, SERVER_NAME, SERVER_VERSION } from './src/config.js';
import { TOOL_DEFINITIONS, handleToolCall } from './src/tools.js';

// The server instance and the tools it exposes, bound to one graph
function createServer(knowledgeGraphManager: KnowledgeGraphManager): Server {
  const server = new Server({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  }, {
    capabilities: {
      tools: {},
    },
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(knowledgeGraphManager, name, args);
  });

  return server;
}

async function main() {
  const config = loadConfig();
  const knowledgeGraphManager = new KnowledgeGraphManager(new StorageManager(config.memoryFilePath));
  const server = createServer(knowledgeGraphManager);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Knowledge Graph MCP Server running on stdio");
  console.error(`Using memory file: ${knowledgeGraphManager.getMemoryFilePath()}`);
}

main().catch((error) => {
  console.error("Fatal error in main():", error);
  process.exit(1);
});
