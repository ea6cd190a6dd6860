export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Runs `operation` with an abort signal that fires after `timeoutMs` or when
 * `parentSignal` aborts. Rejects with {@link TimeoutError} on expiry even if
 * the operation ignores its signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: { label?: string; parentSignal?: AbortSignal } = {}
): Promise<T> {
  const label = options.label ?? "operation";
  const controller = new AbortController();
  const parentSignal = options.parentSignal;
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

  const onParentAbort = (): void => controller.abort(parentSignal?.reason);
  if (parentSignal?.aborted) {
    controller.abort(parentSignal.reason);
  } else {
    parentSignal?.addEventListener("abort", onParentAbort, { once: true });
  }

  const expiry = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), expiry]);
  } finally {
    clearTimeout(timeoutHandle);
    parentSignal?.removeEventListener("abort", onParentAbort);
  }
}
