#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { hitTestTool, renderGraphTool } from './mcp-tools.js';

/**
 * MCP Server for Graphviz graphs
 * Provides tools for rendering graphs and querying what lies at a point
 */

const sourceProperties = {
  text: {
    type: 'string',
    description: 'Graphviz DOT source, or xdot output that already carries drawing attributes',
  },
  program: {
    type: 'string',
    description: 'Graphviz layout program (default: dot)',
  },
  inputFormat: {
    type: 'string',
    enum: ['auto', 'dot', 'xdot'],
    description: 'auto (default) lays out only text without drawing attributes',
  },
};

function asText(value: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }] };
}

/**
 * Start the MCP server
 */
async function startServer() {
  const server = new Server(
    {
      name: 'xdotview',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // Register tool handlers
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: 'render_graph',
        description:
          'Lay out a Graphviz graph and render it to SVG, fitted to a viewport. Returns the SVG, a summary of ' +
          'the nodes and edges with their positions, and any diagnostics raised while reading the layout.',
        inputSchema: {
          type: 'object',
          properties: {
            ...sourceProperties,
            width: { type: 'number', description: 'Viewport width in pixels (default: 800)' },
            height: { type: 'number', description: 'Viewport height in pixels (default: 600)' },
            margin: { type: 'number', description: 'Zoom-to-fit margin in pixels (default: 12)' },
          },
          required: ['text'],
        },
      },
      {
        name: 'hit_test',
        description:
          'Find what lies at a point of a laid-out graph: the link of a node carrying a URL, and the jump target ' +
          '(the node, or the far end of an edge near one of its ends) with the elements it highlights.',
        inputSchema: {
          type: 'object',
          properties: {
            ...sourceProperties,
            x: { type: 'number', description: 'X in graph space, from the left edge of the bounding box' },
            y: { type: 'number', description: 'Y in graph space, down from the top edge of the bounding box' },
          },
          required: ['text', 'x', 'y'],
        },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (name === 'render_graph') return asText(await renderGraphTool(args));
      if (name === 'hit_test') return asText(await hitTestTool(args));
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
  console.error('xdotview MCP server started');
}

// Start the server
startServer().catch((error) => {
  console.error('Failed to start MCP server:', error);
  process.exit(1);
});
