#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { createLogger } from './core/logger.js';
import { DIRECTIONS } from './renderer/types.js';
import { CHARACTER_SET_NAMES } from './renderer/charset.js';
import { detectDiagramTool, renderDiagramTool } from './mcp-tools.js';

/**
 * MCP server exposing the text renderer to agents.
 */

const logger = createLogger('gridchart-mcp', 'info');

function textContent(payload: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(payload, null, 2) }] };
}

async function startServer() {
  const server = new Server(
    {
      name: 'gridchart',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: 'render_diagram',
        description:
          'Draw a flowchart, state, class or git graph diagram as plain text (box-drawing or ASCII characters). ' +
          'Returns the drawing together with any syntax errors and layout warnings.',
        inputSchema: {
          type: 'object',
          properties: {
            text: { type: 'string', description: 'Diagram text, e.g. "flowchart TD\\nA-->B"' },
            style: { type: 'string', enum: [...CHARACTER_SET_NAMES], description: 'Character set (default: unicode)' },
            direction: { type: 'string', enum: [...DIRECTIONS], description: 'Override the diagram direction' },
          },
          required: ['text'],
        },
      },
      {
        name: 'detect_diagram',
        description: 'Report the diagram type (flowchart, state, class, gitgraph or unknown) of a diagram or of each fenced block in Markdown.',
        inputSchema: {
          type: 'object',
          properties: {
            text: { type: 'string', description: 'Diagram text or Markdown content' },
          },
          required: ['text'],
        },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (name === 'render_diagram') return textContent(renderDiagramTool(args, logger));
      if (name === 'detect_diagram') return textContent(detectDiagramTool(args));
      throw new Error(`Unknown tool: ${name}`);
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new Error(`Invalid arguments: ${error.message}`);
      }
      throw error;
    }
  });

  // Start server with stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Log to stderr to avoid interfering with stdio transport
  logger.info('gridchart MCP server started');
}

// Start the server
startServer().catch((error) => {
  logger.fatal('Failed to start MCP server', error);
  process.exit(1);
});
