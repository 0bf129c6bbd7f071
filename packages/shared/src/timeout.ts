/**
 * Per-call Timeouts
 */

/**
 * Race `operation` against a timer. On timeout the error from `onTimeout` is
 * thrown; the operation itself keeps running and its late result is dropped.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  // A rejection after the timeout won must not surface as unhandled.
  void operation.catch(() => undefined);

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
