/**
 * Run `fn` under a deadline of `ms` milliseconds.
 *
 * `fn` receives an AbortSignal to hand to fetch. The timer stays armed until `fn` settles, so
 * reading the response body is bounded too, not only waiting for the headers. Whatever `fn`
 * rejects with after the deadline fired is replaced by `onTimeout(cause)`.
 *
 * @example
 * ```ts
 * const body = await withTimeout(
 *   async (signal) => {
 *     const response = await fetch(tokenUrl, { method: 'POST', body, signal });
 *     return response.text();
 *   },
 *   10000,
 *   (cause) => IssuanceError.timeout(10000, cause)
 * );
 * ```
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onTimeout: (cause: Error | undefined) => Error
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, ms);

  try {
    return await fn(controller.signal);
  } catch (error) {
    if (controller.signal.aborted) {
      throw onTimeout(error instanceof Error ? error : undefined);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
