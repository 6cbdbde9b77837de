// ============================================================================
// Shared Helpers - Barrel Export
// ============================================================================

export { toolSuccess, toolText, toolError } from './response.js';
export { defineTool, toInputSchema } from './define.js';
export { numeric, optionalString, issueFields, formatIssues } from './validation.js';
