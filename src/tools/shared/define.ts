// ============================================================================
// Tool Definition
// ============================================================================
// Compiles a ToolSpec's zod shape once: into a validator for dispatch and
// into the JSON Schema advertised by tools/list.
// ============================================================================

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ToolFault } from '../../errors.js';
import type { McpToolDefinition, ToolDescriptor, ToolSpec } from '../types.js';
import { formatIssues, issueFields } from './validation.js';

const ObjectJsonSchema = z.object({
  properties: z.record(z.unknown()).default({}),
  required: z.array(z.string()).optional(),
});

export function toInputSchema(schema: z.ZodTypeAny): McpToolDefinition['inputSchema'] {
  const json = ObjectJsonSchema.parse(zodToJsonSchema(schema, { $refStrategy: 'none' }));
  return json.required && json.required.length > 0
    ? { type: 'object', properties: json.properties, required: json.required }
    : { type: 'object', properties: json.properties };
}

export function defineTool<S extends z.ZodRawShape>(spec: ToolSpec<S>): ToolDescriptor {
  const schema = z.object(spec.params);

  const definition: McpToolDefinition = {
    name: spec.name,
    title: spec.title,
    description: spec.description,
    inputSchema: toInputSchema(schema),
  };
  if (spec.annotations) {
    definition.annotations = { title: spec.title, ...spec.annotations };
  }

  return {
    definition,
    bind(args) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        throw new ToolFault(
          'InvalidArguments',
          `Invalid arguments for ${spec.name}: ${formatIssues(parsed.error)}`,
          { fields: issueFields(parsed.error) }
        );
      }
      const input = parsed.data;
      return (ctx) => spec.handler(input, ctx);
    },
  };
}
