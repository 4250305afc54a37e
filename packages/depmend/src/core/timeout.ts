import { CancelledError, TimeoutError } from "./errors.js";

/** Bounds applied to one suspending task */
export interface TaskBounds {
  /** Time limit in milliseconds */
  timeoutMs: number;
  /** Run-level cancellation signal */
  signal?: AbortSignal;
}

/** Throw CancelledError when the run has been cancelled */
export function throwIfCancelled(signal: AbortSignal | undefined, subject = "Run"): void {
  if (signal?.aborted) {
    throw new CancelledError(`${subject} cancelled`);
  }
}

/**
 * Run a task bounded by a timeout and the run-level signal.
 * The task receives a combined signal; the returned promise settles as soon as
 * either bound trips, even if the task ignores its signal.
 */
export async function runBounded<T>(
  subject: string,
  bounds: TaskBounds,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  throwIfCancelled(bounds.signal, subject);

  const timeoutSignal = AbortSignal.timeout(bounds.timeoutMs);
  const signals = bounds.signal ? [bounds.signal, timeoutSignal] : [timeoutSignal];
  const combined = AbortSignal.any(signals);

  const toError = (): Error =>
    bounds.signal?.aborted
      ? new CancelledError(`${subject} cancelled`)
      : new TimeoutError(`${subject} timed out after ${bounds.timeoutMs}ms`, bounds.timeoutMs);

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(toError());
    combined.addEventListener("abort", onAbort, { once: true });
  });

  try {
    return await Promise.race([task(combined), aborted]);
  } catch (error) {
    if (combined.aborted) {
      throw toError();
    }
    throw error;
  } finally {
    if (onAbort) {
      combined.removeEventListener("abort", onAbort);
    }
  }
}
