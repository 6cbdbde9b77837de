// ============================================================================
// Request Scope
// ============================================================================
// One AbortController per upstream call, aborted by either the deadline or
// the caller's signal. dispose() must run on every exit path.
// ============================================================================

export type AbortReason = 'timeout' | 'cancelled';

export interface RequestScope {
  signal: AbortSignal;
  /** Why the scope aborted, or null while still live */
  reason(): AbortReason | null;
  dispose(): void;
}

export function openRequestScope(timeoutMs: number, parent?: AbortSignal): RequestScope {
  const controller = new AbortController();
  let reason: AbortReason | null = null;

  const abort = (why: AbortReason) => {
    if (reason) return;
    reason = why;
    controller.abort();
  };

  const timer = setTimeout(() => abort('timeout'), timeoutMs);
  const onParentAbort = () => abort('cancelled');

  if (parent?.aborted) {
    abort('cancelled');
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    reason: () => reason,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Run `fn` inside a request scope and release the scope afterwards,
 * whether `fn` resolves, rejects or is aborted.
 */
export async function withRequestScope<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  fn: (scope: RequestScope) => Promise<T>
): Promise<T> {
  const scope = openRequestScope(timeoutMs, parent);
  try {
    return await fn(scope);
  } finally {
    scope.dispose();
  }
}
