/**
 * Bound an outbound call by a timeout and the caller's cancellation signal.
 *
 * The task receives a combined signal to pass on to fetch / the AI SDK. The
 * returned promise settles as soon as that signal fires, even if the task
 * itself ignores it.
 */

import { DeadlineExceededError } from "../errors";

export interface DeadlineOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions
): Promise<T> {
  const timeout = AbortSignal.timeout(options.timeoutMs);
  const combined = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

  const deadlineError = () =>
    new DeadlineExceededError(timeout.aborted ? "timeout" : "aborted", options.timeoutMs);

  if (combined.aborted) {
    return Promise.reject(deadlineError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(deadlineError());
    combined.addEventListener("abort", onAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = task(combined);
    } catch (error) {
      combined.removeEventListener("abort", onAbort);
      reject(error);
      return;
    }

    void pending.then(
      (value) => {
        combined.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        combined.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}
