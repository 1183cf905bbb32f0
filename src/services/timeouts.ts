/**
 * Deadlines for external calls.
 */

import { TimeoutError } from "./errors.js";

/**
 * Race a call against a deadline.
 *
 * The callback receives an AbortSignal that fires on timeout so adapters
 * that support cancellation (fetch, the OpenAI SDK) stop their request.
 *
 * @param capability - Name used in the timeout error
 * @param timeoutMs - Deadline in milliseconds
 * @param fn - The call to make
 */
export async function withTimeout<T>(
  capability: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(capability, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
