// ============================================================================
// HTTP Transport Adapter
// ============================================================================
// Wraps httpServer.ts: REST endpoints plus the Streamable HTTP MCP endpoint.
// ============================================================================

import { DEFAULT_HTTP_PORT, log } from '../config.js';
import type { ToolKernel } from '../kernel.js';
import type { TransportAdapter, TransportConfig } from './types.js';
import { startHttpServer, type HttpServerHandle } from '../httpServer.js';

export class HttpAdapter implements TransportAdapter {
  readonly name = 'http';
  private handle: HttpServerHandle | null = null;

  async start(kernel: ToolKernel, config: TransportConfig): Promise<void> {
    this.handle = await startHttpServer(kernel, {
      port: config.port ?? DEFAULT_HTTP_PORT,
      host: config.host || '0.0.0.0',
    });
    log('HTTP transport started');
  }

  async stop(): Promise<void> {
    if (this.handle) {
      await this.handle.stop();
      this.handle = null;
    }
  }
}
