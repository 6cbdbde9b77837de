// ============================================================================
// Tool Faults
// ============================================================================
// Every failure a tool call can produce is classified into one FaultKind so
// callers can branch on `kind` instead of parsing message strings.
// ============================================================================

export type FaultKind =
  | 'UnknownTool'
  | 'InvalidArguments'
  | 'DuplicateToolName'
  | 'UpstreamUnavailable'
  | 'UpstreamDataMissing'
  | 'StoreUnavailable'
  | 'Cancelled'
  | 'Internal';

/** Wire shape of a fault inside a tool result */
export interface FaultPayload {
  error: string;
  kind: FaultKind;
  cause?: string;
  fields?: string[];
}

export interface ToolFaultOptions {
  /** Underlying diagnostic message, kept separate from the user-facing one */
  cause?: string;
  /** Offending argument names (InvalidArguments only) */
  fields?: string[];
}

export class ToolFault extends Error {
  readonly kind: FaultKind;
  readonly detail?: string;
  readonly fields?: string[];

  constructor(kind: FaultKind, message: string, options: ToolFaultOptions = {}) {
    super(message);
    this.name = 'ToolFault';
    this.kind = kind;
    this.detail = options.cause;
    this.fields = options.fields;
  }

  toJSON(): FaultPayload {
    const payload: FaultPayload = { error: this.message, kind: this.kind };
    if (this.detail !== undefined) payload.cause = this.detail;
    if (this.fields && this.fields.length > 0) payload.fields = [...this.fields];
    return payload;
  }
}

export function isToolFault(value: unknown): value is ToolFault {
  return value instanceof ToolFault;
}

/**
 * One-line description of any thrown value.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * True for the DOMException fetch raises when its signal aborts.
 */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
