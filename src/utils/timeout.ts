export class TimeoutError extends Error {
  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class AbortError extends Error {
  constructor(public readonly operation: string) {
    super(`${operation} was aborted`);
    this.name = 'AbortError';
  }
}

/**
 * Race an operation against a deadline and an optional abort signal.
 * The underlying operation is not cancelled; its result is simply ignored
 * once the deadline passes.
 */
export function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  work: Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new AbortError(operation));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      cleanup();
      reject(new AbortError(operation));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    signal?.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      },
    );
  });
}
