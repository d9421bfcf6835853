import { RequestTimeoutError } from "../domain/errors.js";

/**
 * Run `fn` and reject with RequestTimeoutError if it has not settled within
 * `timeoutMs`. The underlying work is not cancelled; its late result is
 * dropped. A timeout of 0 or less disables the deadline.
 */
export async function withDeadline<T>(operation: string, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
  if (timeoutMs <= 0) return fn();

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new RequestTimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
