/**
 * MCP stdio server
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  CompleteRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { getCompletions } from './completion.js';
import { handleToolCall } from './handlers.js';
import { logger } from './logging.js';
import { createToolServices, type ToolServices } from './services.js';
import { TOOL_DEFINITIONS } from './tools.js';

export function createServer(services: ToolServices): Server {
  const server = new Server(
    {
      name: 'azure-admin-toolkit',
      version: services.version,
    },
    {
      capabilities: {
        tools: {},
        completions: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOL_DEFINITIONS.map(tool => ({ ...tool })),
  }));

  server.setRequestHandler(CompleteRequestSchema, async request => ({
    completion: getCompletions(request.params.argument.name, request.params.argument.value),
  }));

  server.setRequestHandler(CallToolRequestSchema, async request =>
    handleToolCall(request.params.name, request.params.arguments, services)
  );

  return server;
}

export async function startMcpServer(services: ToolServices = createToolServices()): Promise<void> {
  const server = createServer(services);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // stdout carries the protocol; the banner goes to stderr
  console.error('='.repeat(70));
  console.error(`Azure Admin Toolkit MCP server v${services.version} (stdio)`);
  console.error(`Tools: ${TOOL_DEFINITIONS.map(t => t.name).join(', ')}`);
  console.error('Authentication: Azure CLI credentials (az login), then DefaultAzureCredential');
  console.error('='.repeat(70));
  logger.info('MCP server started', { tools: TOOL_DEFINITIONS.length });
}
