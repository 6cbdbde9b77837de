/**
 * HTTP Server Mode
 *
 * Exposes the tool kernel over HTTP for remote agents.
 *
 * Usage:
 *   node dist/server.js --http --port 8787
 *   node dist/server.js --http --host 127.0.0.1
 *
 * Endpoints:
 *   GET  /health   - Health check (also GET /)
 *   GET  /tools    - List available tools
 *   POST /call     - Execute any tool: { tool: string, arguments: object }
 *   *    /mcp      - Full MCP protocol endpoint (Streamable HTTP, stateless)
 *
 * REST responses use a status envelope:
 *   { "status": "executed", ...data }
 *   { "status": "error", "error": "...", "code": "..." }
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { z } from 'zod';
import { DEFAULT_HTTP_PORT, PKG, log } from './config.js';
import { describeError, isToolFault } from './errors.js';
import type { ToolKernel } from './kernel.js';
import { createMcpServer } from './transports/mcp.js';

// ============================================================================
// Status Envelope Types
// ============================================================================

interface StatusEnvelope {
  status: 'ok' | 'executed' | 'error';
  [key: string]: unknown;
}

interface ErrorEnvelope extends StatusEnvelope {
  status: 'error';
  error: string;
  code?: string;
}

// ============================================================================
// Response Helpers
// ============================================================================

/**
 * Wrap a successful result in status envelope
 */
function wrapSuccess(data: Record<string, unknown>): StatusEnvelope {
  return { status: 'executed', ...data };
}

/**
 * Wrap an error in status envelope
 */
function wrapError(error: string, code?: string, extra: Record<string, unknown> = {}): ErrorEnvelope {
  return { status: 'error', error, ...(code ? { code } : {}), ...extra };
}

/**
 * Send JSON response with status envelope
 */
function sendJson(res: ServerResponse, statusCode: number, data: StatusEnvelope): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

class BodyParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BodyParseError';
  }
}

/**
 * Parse JSON body from request
 */
async function parseBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.setEncoding('utf-8');
    req.on('data', (chunk: string) => { body += chunk; });
    req.on('end', () => {
      try {
        resolve(body ? JSON.parse(body) : {});
      } catch {
        reject(new BodyParseError('Invalid JSON'));
      }
    });
    req.on('error', reject);
  });
}

const CallBodySchema = z.object({
  tool: z.string().min(1),
  arguments: z.record(z.unknown()).nullish(),
});

// ============================================================================
// Route Handlers
// ============================================================================

async function handleCall(kernel: ToolKernel, req: IncomingMessage, res: ServerResponse): Promise<void> {
  let raw: unknown;
  try {
    raw = await parseBody(req);
  } catch (error) {
    sendJson(res, 400, wrapError(describeError(error), 'PARSE_ERROR'));
    return;
  }

  const body = CallBodySchema.safeParse(raw);
  if (!body.success) {
    sendJson(res, 400, wrapError('Body must be { "tool": string, "arguments"?: object }', 'MISSING_TOOL'));
    return;
  }

  const { tool, arguments: args } = body.data;
  log(`HTTP: /call tool=${tool}`);

  // Abandon the upstream work if the client goes away mid-call
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });

  try {
    const result = await kernel.dispatch(tool, args ?? {}, { signal: controller.signal });
    sendJson(res, 200, wrapSuccess({ result }));
  } catch (error) {
    if (isToolFault(error) && error.kind === 'UnknownTool') {
      sendJson(res, 404, wrapError(error.message, 'UNKNOWN_TOOL'));
    } else if (isToolFault(error) && error.kind === 'InvalidArguments') {
      sendJson(res, 400, wrapError(error.message, 'INVALID_ARGUMENTS', { fields: error.fields ?? [] }));
    } else {
      sendJson(res, 500, wrapError(describeError(error), 'INTERNAL_ERROR'));
    }
  }
}

/**
 * Stateless MCP: a fresh Server + transport per request, closed with the
 * response.
 */
async function handleMcp(kernel: ToolKernel, req: IncomingMessage, res: ServerResponse): Promise<void> {
  const server = createMcpServer(kernel);
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined,
  });

  res.on('close', () => {
    Promise.all([transport.close(), server.close()]).catch((error) => {
      log(`HTTP: Error closing MCP transport: ${describeError(error)}`);
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res);
}

// ============================================================================
// Server
// ============================================================================

export interface HttpServerOptions {
  port: number;
  host?: string;
}

export interface HttpServerHandle {
  /** Bound port (differs from the requested one when 0 was asked for) */
  port: number;
  host: string;
  stop(): Promise<void>;
}

/**
 * Start an HTTP server exposing the kernel.
 */
export async function startHttpServer(
  kernel: ToolKernel,
  options: HttpServerOptions
): Promise<HttpServerHandle> {
  const { port, host = '0.0.0.0' } = options;

  const httpServer = createServer(async (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url || '/', `http://${req.headers.host || 'localhost'}`);
    const path = url.pathname;

    log(`HTTP: ${req.method} ${path}`);

    // CORS headers for browser-based clients
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, Mcp-Session-Id, Mcp-Protocol-Version, Accept');
    res.setHeader('Access-Control-Expose-Headers', 'Mcp-Session-Id');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      if ((path === '/' || path === '/health') && req.method === 'GET') {
        sendJson(res, 200, {
          status: 'ok',
          name: PKG.name,
          version: PKG.version,
          tools: kernel.toolCount,
        });
        return;
      }

      if (path === '/tools' && req.method === 'GET') {
        sendJson(res, 200, wrapSuccess({ tools: kernel.list() }));
        return;
      }

      if (path === '/call' && req.method === 'POST') {
        await handleCall(kernel, req, res);
        return;
      }

      if (path === '/mcp') {
        await handleMcp(kernel, req, res);
        return;
      }

      sendJson(res, 404, wrapError('Not found', 'NOT_FOUND'));
    } catch (error) {
      const message = describeError(error);
      log(`HTTP: Error handling ${req.method} ${path}: ${message}`);
      if (!res.headersSent) {
        sendJson(res, 500, wrapError(message, 'INTERNAL_ERROR'));
      } else if (!res.writableEnded) {
        res.end();
      }
    }
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(port, host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const boundPort = address !== null && typeof address === 'object' ? address.port : port;

  log(`HTTP Server listening on http://${host}:${boundPort}`);

  return {
    port: boundPort,
    host,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        httpServer.closeAllConnections();
        httpServer.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/**
 * Parse command line arguments for HTTP mode. Flags override `defaults`.
 */
export function parseHttpArgs(
  args: string[],
  defaults: { port: number; host: string } = { port: DEFAULT_HTTP_PORT, host: '0.0.0.0' }
): {
  httpMode: boolean;
  port: number;
  host: string;
} {
  const httpMode = args.includes('--http');

  const portIndex = args.indexOf('--port');
  const parsedPort = portIndex !== -1 ? Number.parseInt(args[portIndex + 1] ?? '', 10) : NaN;
  const port = Number.isInteger(parsedPort) && parsedPort >= 0 && parsedPort <= 65535
    ? parsedPort
    : defaults.port;

  const hostIndex = args.indexOf('--host');
  const hostArg = hostIndex !== -1 ? args[hostIndex + 1] : undefined;
  const host = hostArg && !hostArg.startsWith('--') ? hostArg : defaults.host;

  return { httpMode, port, host };
}
