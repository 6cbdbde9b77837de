// ============================================================================
// Echo Tool
// ============================================================================
// Connectivity check: returns its input untouched.
// ============================================================================

import { z } from 'zod';
import { ToolDescriptor } from '../types.js';
import { defineTool, toolText } from '../shared/index.js';

export const echoTool: ToolDescriptor = defineTool({
  name: 'echo',
  title: 'Echo',
  description: 'Return the given text unchanged. Useful for checking that the server is reachable.',
  annotations: {
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: false,
  },
  params: {
    text: z.string().describe('Text to echo back'),
  },
  handler: async ({ text }) => toolText(text),
});

export const echoTools: ToolDescriptor[] = [echoTool];
