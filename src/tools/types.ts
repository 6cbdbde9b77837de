// ============================================================================
// Tool Types
// ============================================================================
// Shared type definitions for the modular tool architecture.
// ============================================================================

import type { z } from 'zod';
import type { CallToolResult, ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';

/**
 * Standard MCP tool result format
 */
export type ToolResult = CallToolResult;

/**
 * Per-call context handed to every handler.
 */
export interface ToolContext {
  /** Aborts when the caller cancels the request */
  signal?: AbortSignal;
}

/**
 * What a tool module writes: metadata, an ordered zod shape describing its
 * parameters, and a handler typed by that shape.
 */
export interface ToolSpec<S extends z.ZodRawShape> {
  name: string;
  title: string;
  description: string;
  annotations?: ToolAnnotations;
  params: S;
  handler: (args: z.output<z.ZodObject<S, 'strip'>>, ctx: ToolContext) => Promise<ToolResult>;
}

/**
 * MCP tools/list entry. A type alias, not an interface, so it stays
 * assignable to the SDK's open-ended Tool shape.
 */
export type McpToolDefinition = {
  name: string;
  title: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
  annotations?: ToolAnnotations;
};

/**
 * A tool as the kernel sees it, after its parameter shape has been compiled.
 * `bind` validates raw arguments (throwing InvalidArguments) and returns the
 * ready-to-run call.
 */
export interface ToolDescriptor {
  definition: McpToolDefinition;
  bind(args: unknown): (ctx: ToolContext) => Promise<ToolResult>;
}
