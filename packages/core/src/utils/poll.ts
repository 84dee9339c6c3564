import { FinalizationTimeoutError } from "../errors.js"

export interface PollOptions {
  intervalMs: number
  timeoutMs: number
  /** What is being waited for, used in the timeout message */
  description?: string
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Call `fn` until it yields a value other than `undefined`.
 *
 * The first call happens immediately and later calls are `intervalMs` apart.
 * When a miss happens `timeoutMs` or more after the start, polling stops with
 * FinalizationTimeoutError. Errors thrown by `fn` end the polling.
 */
export async function pollUntil<T>(
  fn: () => Promise<T | undefined>,
  options: PollOptions,
): Promise<T> {
  const start = Date.now()

  for (;;) {
    const value = await fn()
    if (value !== undefined) {
      return value
    }

    if (Date.now() - start >= options.timeoutMs) {
      throw new FinalizationTimeoutError(
        `Timed out after ${options.timeoutMs / 1000}s waiting for ${options.description ?? "result"}`,
        options.timeoutMs,
      )
    }
    await sleep(options.intervalMs)
  }
}
