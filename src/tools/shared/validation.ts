// ============================================================================
// Validation Helpers
// ============================================================================
// Parameter builders with the coercion rules every tool shares.
// ============================================================================

import { z } from 'zod';

function numericString(value: unknown): unknown {
  if (value === null) {
    return undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value);
  }
  return value;
}

/**
 * A finite number. Numeric strings ("10", " 2.5 ") are accepted and
 * converted. null counts as omitted, so a `.default()` applies to it; blank
 * strings and booleans are rejected.
 */
export function numeric(inner: z.ZodNumber = z.number().finite()) {
  return z.preprocess(numericString, inner);
}

/**
 * A string that may be omitted. null counts as omitted.
 */
export function optionalString() {
  return z.preprocess((value) => (value === null ? undefined : value), z.string().optional());
}

/**
 * Offending top-level field names, in the order the issues were reported,
 * without duplicates.
 */
export function issueFields(error: z.ZodError): string[] {
  const fields: string[] = [];
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : '(arguments)';
    if (!fields.includes(field)) {
      fields.push(field);
    }
  }
  return fields;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
