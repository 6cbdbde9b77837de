// ============================================================================
// Response Helpers
// ============================================================================
// Standardized response formatting for tool handlers.
// ============================================================================

import { ToolResult } from '../types.js';
import { ToolFault } from '../../errors.js';

/**
 * Create a successful tool response
 */
export function toolSuccess(data: unknown): ToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(data, null, 2),
    }],
  };
}

/**
 * Create a successful plain-text response (no JSON encoding)
 */
export function toolText(text: string): ToolResult {
  return {
    content: [{ type: 'text', text }],
  };
}

/**
 * Create an error tool response
 */
export function toolError(fault: ToolFault): ToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(fault.toJSON(), null, 2),
    }],
    isError: true,
  };
}
