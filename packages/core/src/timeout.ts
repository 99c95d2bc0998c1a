import { TimeoutError } from "./errors.js";

/**
 * Run `fn` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise rejects with TimeoutError at that point even if `fn` ignores the
 * signal. A missing or non-positive limit disables the timer.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number | undefined,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs === undefined || timeoutMs <= 0) {
    return fn(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}
