#!/usr/bin/env node

/**
 * Complexity History MCP Server
 * Tracks how a repository's endpoints, outbound calls and dependencies
 * evolve across its git history
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { analyzeComplexityHistory, analyzeComplexityHistorySchema } from './tools/complexity-history.js';
import { analyzeComplexitySnapshot, analyzeComplexitySnapshotSchema } from './tools/complexity-snapshot.js';
import { planHistorySnapshots, planHistorySnapshotsSchema } from './tools/snapshot-plan.js';
import { toolError, zodToJsonSchema } from './utils/mcp.js';
import { createShutdownHandler } from './utils/shutdown.js';

interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.AnyZodObject;
  run: (args: unknown) => Promise<unknown>;
}

/**
 * Bind a zod-validated handler to its tool metadata
 */
function defineTool<S extends z.AnyZodObject>(tool: {
  name: string;
  description: string;
  inputSchema: S;
  handler: (input: z.output<S>) => Promise<unknown>;
}): ToolDefinition {
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
    run: async (args) => tool.handler(tool.inputSchema.parse(args)),
  };
}

/**
 * Tool definitions with Zod schemas
 */
const TOOLS: readonly ToolDefinition[] = [
  defineTool({
    name: 'analyze_complexity_history',
    description: `Mine git history for architectural complexity trends and write a CSV report.

At each sampled date (weekly or monthly) the latest commit on the primary
branch (main, master or develop) is checked out and analyzed for:
- Exposed API endpoints (Spring, JAX-RS, Express, Flask, net/http, Laravel)
- Outbound inter-service calls (HTTP clients, gRPC stubs, URLs, /api paths)
- Third-party dependencies (pom.xml, package.json, requirements.txt, build.gradle, go.mod, ...)

The working tree is restored to its original head afterwards, even on failure.`,
    inputSchema: analyzeComplexityHistorySchema,
    handler: analyzeComplexityHistory,
  }),

  defineTool({
    name: 'analyze_complexity_snapshot',
    description: `Analyze the current working tree without touching git history.

Returns the endpoint, call and dependency lists with their counts, the
analyzed module paths, and any files or manifests that could not be read.`,
    inputSchema: analyzeComplexitySnapshotSchema,
    handler: analyzeComplexitySnapshot,
  }),

  defineTool({
    name: 'plan_history_snapshots',
    description: `Preview the snapshots a history run would analyze.

Resolves the primary branch and maps each sampled date to the latest commit
at or before it. Read-only: nothing is checked out.`,
    inputSchema: planHistorySnapshotsSchema,
    handler: planHistorySnapshots,
  }),
];

const TOOLS_BY_NAME = new Map(TOOLS.map(tool => [tool.name, tool]));

/**
 * Create and configure the MCP server
 */
function createServer(): Server {
  const server = new Server(
    {
      name: 'complexity-history-mcp',
      version: '1.0.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: TOOLS.map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: zodToJsonSchema(tool.inputSchema),
      })),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const tool = TOOLS_BY_NAME.get(name);
    if (!tool) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }

    try {
      const result = await tool.run(args);

      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    } catch (error) {
      throw toolError(error);
    }
  });

  return server;
}

/**
 * Serve over stdio until the client sends a termination signal
 */
async function main(): Promise<void> {
  const server = createServer();
  await server.connect(new StdioServerTransport());

  const shutdown = createShutdownHandler({
    close: () => server.close(),
    exit: code => process.exit(code),
  });
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }

  // stdout carries the protocol
  console.error('Complexity History MCP server started');
}

main().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});

// Export tools for programmatic use
export {
  analyzeComplexityHistory,
  analyzeComplexityHistorySchema,
  analyzeComplexitySnapshot,
  analyzeComplexitySnapshotSchema,
  planHistorySnapshots,
  planHistorySnapshotsSchema,
};

// Export types
export * from './types.js';
