import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { ToolKernel } from '../../src/kernel.js';
import type { ToolResult } from '../../src/tools/types.js';
import { createMcpServer } from '../../src/transports/mcp.js';

export interface TestMcpClient {
  client: Client;
  server: Server;
  close: () => Promise<void>;
  listTools: () => Promise<Array<{ name: string; description?: string }>>;
  callTool: (name: string, args?: Record<string, unknown>) => Promise<ToolResult>;
}

/**
 * Creates a test MCP client connected to the production server factory via
 * an in-memory transport, so the whole protocol flow runs without stdio.
 */
export async function createTestMcpClient(kernel: ToolKernel): Promise<TestMcpClient> {
  const server = createMcpServer(kernel);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

  const client = new Client(
    { name: 'test-client', version: '1.0.0' },
    { capabilities: {} }
  );

  await Promise.all([
    client.connect(clientTransport),
    server.connect(serverTransport),
  ]);

  return {
    client,
    server,
    close: async () => {
      await client.close();
      await server.close();
    },
    listTools: async () => {
      const result = await client.listTools();
      return result.tools.map((t) => ({ name: t.name, description: t.description }));
    },
    callTool: (name, args = {}) =>
      client.request(
        { method: 'tools/call', params: { name, arguments: args } },
        CallToolResultSchema
      ),
  };
}
