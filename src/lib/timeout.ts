/**
 * NewsScout — Timeouts
 */

export type Timed<T> = { status: 'ok'; value: T } | { status: 'timeout'; timeoutMs: number };

/**
 * Race an operation against a timer. On timeout the operation's signal is
 * aborted and the result resolves as `timeout`; rejections pass through.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<Timed<T>> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<Timed<T>>(resolve => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ status: 'timeout', timeoutMs });
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      operation(controller.signal).then((value): Timed<T> => ({ status: 'ok', value })),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}
