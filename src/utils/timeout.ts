export class DeadlineExceededError extends Error {
  constructor(public readonly ms: number) {
    super(`Deadline of ${ms}ms exceeded`);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Runs `fn` with an AbortSignal that fires after `ms`, and rejects with
 * DeadlineExceededError at that point even if `fn` ignores the signal.
 */
export async function withDeadline<T>(fn: (signal: AbortSignal) => Promise<T>, ms: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new DeadlineExceededError(ms));
    }, ms);
  });
  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
