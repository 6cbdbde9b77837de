// ============================================================================
// Tool Kernel
// ============================================================================
// The kernel owns the tool registry, argument validation and dispatch.
// Every transport (stdio, HTTP, /call) goes through the same kernel.
// ============================================================================

import { EventEmitter } from 'events';
import { log, warn } from './config.js';
import { ToolFault, describeError, isAbortError } from './errors.js';
import type { McpToolDefinition, ToolDescriptor, ToolResult } from './tools/types.js';
import { toolError } from './tools/shared/index.js';

// ============================================================================
// Dispatch Context
// ============================================================================

/**
 * Optional context threaded through every dispatch call.
 */
export interface DispatchContext {
  /** Aborts when the transport cancels the request */
  signal?: AbortSignal;
  /** Transport-level request id, for log correlation */
  requestId?: string | number;
}

// ============================================================================
// Dispatch Events
// ============================================================================

export type DispatchEventType = 'dispatch' | 'result' | 'error';

export interface DispatchEvent {
  type: DispatchEventType;
  tool: string;
  requestId?: string | number;
  timestamp: string;
  duration_ms?: number;
  success?: boolean;
  error?: string;
}

// ============================================================================
// Tool Kernel
// ============================================================================

export interface ToolKernel {
  /**
   * Add a tool. Throws DuplicateToolName if the name is taken.
   */
  register(tool: ToolDescriptor): void;

  /**
   * Dispatch a tool call.
   * Throws UnknownTool or InvalidArguments; handler failures come back as
   * an error result, never as a throw.
   */
  dispatch(name: string, args: unknown, context?: DispatchContext): Promise<ToolResult>;

  /** tools/list definitions in registration order */
  list(): McpToolDefinition[];

  has(name: string): boolean;

  /** Subscribe to dispatch events (dispatch, result, error) */
  on(event: DispatchEventType, listener: (evt: DispatchEvent) => void): void;

  readonly toolCount: number;
}

/**
 * Create the tool kernel. Call once at startup; every transport shares it.
 */
export function createKernel(initialTools: ToolDescriptor[] = []): ToolKernel {
  const toolMap = new Map<string, ToolDescriptor>();

  // EventEmitter throws on .emit('error') if no listener is registered.
  // Register a no-op default so unsubscribed errors don't crash the process.
  const emitter = new EventEmitter();
  emitter.on('error', () => {});

  function emit(evt: DispatchEvent): void {
    emitter.emit(evt.type, evt);
  }

  function register(tool: ToolDescriptor): void {
    const { name } = tool.definition;
    if (toolMap.has(name)) {
      throw new ToolFault('DuplicateToolName', `Tool already registered: ${name}`);
    }
    toolMap.set(name, tool);
  }

  async function dispatch(
    name: string,
    args: unknown,
    context: DispatchContext = {}
  ): Promise<ToolResult> {
    const { requestId, signal } = context;

    const tool = toolMap.get(name);
    if (!tool) {
      throw new ToolFault('UnknownTool', `Unknown tool: ${name}`);
    }

    // Throws InvalidArguments before anything runs
    const call = tool.bind(args);

    log(`Kernel: dispatch ${name}${requestId !== undefined ? ` (request=${requestId})` : ''}`);

    const startTime = Date.now();
    emit({ type: 'dispatch', tool: name, requestId, timestamp: new Date().toISOString() });

    try {
      const result = await call({ signal });
      emit({
        type: 'result', tool: name, requestId, timestamp: new Date().toISOString(),
        duration_ms: Date.now() - startTime, success: !result.isError,
      });
      return result;
    } catch (err) {
      const errMsg = describeError(err);
      emit({
        type: 'error', tool: name, requestId, timestamp: new Date().toISOString(),
        duration_ms: Date.now() - startTime, error: errMsg,
      });

      if (signal?.aborted || isAbortError(err)) {
        return toolError(new ToolFault('Cancelled', 'Request cancelled', { cause: errMsg }));
      }

      warn(`Kernel: tool ${name} threw: ${errMsg}`);
      return toolError(new ToolFault('Internal', `Tool ${name} failed: ${errMsg}`, { cause: errMsg }));
    }
  }

  for (const tool of initialTools) {
    register(tool);
  }

  log(`Kernel: loaded ${toolMap.size} tools`);

  return {
    register,
    dispatch,
    list: () => Array.from(toolMap.values(), t => t.definition),
    has: (name: string) => toolMap.has(name),
    on: (event, listener) => {
      emitter.on(event, listener);
    },
    get toolCount() {
      return toolMap.size;
    },
  };
}
