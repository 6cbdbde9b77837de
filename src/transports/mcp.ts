// ============================================================================
// Shared MCP Server Factory
// ============================================================================
// Creates an MCP Server with ListTools + CallTool handlers wired to the kernel.
// Each transport adapter calls this to get its own Server instance.
// ============================================================================

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';
import { PKG, log } from '../config.js';
import { ToolFault, describeError, isToolFault } from '../errors.js';
import { toolError } from '../tools/shared/index.js';
import type { ToolKernel } from '../kernel.js';

/**
 * Create an MCP Server wired to the given kernel.
 * Each transport gets its own Server instance (MCP SDK only supports
 * one transport per Server).
 */
export function createMcpServer(kernel: ToolKernel): Server {
  const server = new Server(
    { name: PKG.name, version: PKG.version },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: kernel.list() };
  });

  // Handle tool calls by dispatching through the kernel
  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;

    log(`Tool called: ${name}`);
    log(`Arguments:`, JSON.stringify(args ?? {}, null, 2));

    try {
      return await kernel.dispatch(name, args, {
        signal: extra.signal,
        requestId: extra.requestId,
      });
    } catch (error) {
      // Naming a tool that doesn't exist, or calling it wrongly, is a
      // protocol error; everything else stays inside the tool result.
      if (isToolFault(error) && (error.kind === 'UnknownTool' || error.kind === 'InvalidArguments')) {
        throw new McpError(ErrorCode.InvalidParams, error.message, error.toJSON());
      }
      const errorMessage = describeError(error);
      log(`Error in tool ${name}:`, errorMessage);
      return toolError(new ToolFault('Internal', errorMessage));
    }
  });

  return server;
}
