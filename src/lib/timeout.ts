// ============================================
// Per-call timeout + cancellation for external I/O
// ============================================

import { cancelledError, timeoutError } from "./errors.js";

/**
 * Run an abortable call with a deadline.
 *
 * The child signal handed to `run` aborts when the deadline passes or when
 * `parentSignal` aborts; the returned promise rejects with TIMEOUT or
 * CANCELLED respectively, without waiting for `run` to settle.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>,
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    throw cancelledError(label, parentSignal.reason);
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = timeoutError(label, timeoutMs);
      // Settle first: a callee listening on the signal rejects inside abort()
      reject(err);
      controller.abort(err);
    }, timeoutMs);
  });

  const cancellation = new Promise<never>((_, reject) => {
    if (!parentSignal) return;
    onParentAbort = () => {
      const err = cancelledError(label, parentSignal.reason);
      reject(err);
      controller.abort(err);
    };
    parentSignal.addEventListener("abort", onParentAbort, { once: true });
  });

  try {
    return await Promise.race([run(controller.signal), deadline, cancellation]);
  } finally {
    clearTimeout(timer);
    if (parentSignal && onParentAbort) {
      parentSignal.removeEventListener("abort", onParentAbort);
    }
  }
}
