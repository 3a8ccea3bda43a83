import { cancellationOf } from "./errors";

/** Resolves after `ms`, or rejects with the run's CancelledError once `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  const delay = Math.max(0, ms);
  if (!signal) {
    return new Promise((resolve) => setTimeout(resolve, delay));
  }
  if (signal.aborted) {
    return Promise.reject(cancellationOf(signal));
  }

  const runSignal: AbortSignal = signal;
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(cancellationOf(runSignal));
    };
    const timer = setTimeout(() => {
      runSignal.removeEventListener("abort", onAbort);
      resolve();
    }, delay);
    runSignal.addEventListener("abort", onAbort, { once: true });
  });
}
