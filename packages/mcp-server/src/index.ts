#!/usr/bin/env node
/**
 * surfkit MCP Server
 *
 * Wraps the surface ingestion and repair pipeline as callable tools for
 * LLM agents. Runs over stdio transport.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerTools } from './tools.js';

const server = new McpServer({
  name: 'surfkit',
  version: '0.1.0',
});

registerTools(server);

const transport = new StdioServerTransport();
await server.connect(transport);
