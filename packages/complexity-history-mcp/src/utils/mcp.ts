/**
 * MCP protocol helpers
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { NotAGitRepositoryError, RunAbortedError } from '../errors.js';

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
}

/**
 * Convert Zod schema to JSON Schema for MCP
 */
export function zodToJsonSchema(schema: z.AnyZodObject): ToolInputSchema {
  const shape: z.ZodRawShape = schema.shape;
  const properties: Record<string, unknown> = {};
  const required: string[] = [];

  for (const [key, zodType] of Object.entries(shape)) {
    const description = zodType.description;

    // Handle optional types
    let innerType: z.ZodTypeAny = zodType;
    let isOptional = false;

    if (zodType instanceof z.ZodOptional) {
      isOptional = true;
      innerType = zodType.unwrap();
    } else if (zodType instanceof z.ZodDefault) {
      isOptional = true;
      innerType = zodType.removeDefault();
    }

    let jsonType: Record<string, unknown> = {};

    if (innerType instanceof z.ZodString) {
      jsonType = { type: 'string' };
    } else if (innerType instanceof z.ZodNumber) {
      jsonType = { type: innerType.isInt ? 'integer' : 'number' };
    } else if (innerType instanceof z.ZodBoolean) {
      jsonType = { type: 'boolean' };
    } else if (innerType instanceof z.ZodEnum) {
      jsonType = { type: 'string', enum: innerType.options };
    } else if (innerType instanceof z.ZodArray) {
      jsonType = { type: 'array', items: { type: 'string' } };
    } else if (innerType instanceof z.ZodObject) {
      jsonType = { type: 'object' };
    } else {
      jsonType = { type: 'string' }; // Default fallback
    }

    if (description) {
      jsonType.description = description;
    }

    properties[key] = jsonType;

    if (!isOptional) {
      required.push(key);
    }
  }

  return {
    type: 'object',
    properties,
    required: required.length > 0 ? required : undefined,
  };
}

/**
 * Map a tool failure onto an MCP error
 */
export function toolError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }

  if (error instanceof z.ZodError) {
    return new McpError(
      ErrorCode.InvalidParams,
      `Invalid parameters: ${error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')}`
    );
  }

  if (error instanceof NotAGitRepositoryError) {
    return new McpError(ErrorCode.InvalidParams, error.message);
  }

  if (error instanceof RunAbortedError) {
    return new McpError(ErrorCode.InternalError, `Run aborted (${error.stage}): ${error.message}`);
  }

  if (error instanceof Error) {
    return new McpError(ErrorCode.InternalError, `Tool execution failed: ${error.message}`);
  }

  return new McpError(ErrorCode.InternalError, 'An unexpected error occurred');
}
