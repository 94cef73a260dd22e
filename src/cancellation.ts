/**
 * Cooperative cancellation helpers built on AbortController.
 *
 * `linkCancellation` merges the caller's signal and a timeout into one signal
 * that is handed to every platform call. `raceAbort` stops waiting on a call
 * as soon as that signal fires, even if the client ignores the signal.
 */

export interface Cancellation {
  signal: AbortSignal;
  /** Clears the timer and detaches from the caller's signal */
  dispose(): void;
}

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export function linkCancellation(
  external: AbortSignal | undefined,
  timeoutMs: number
): Cancellation {
  const controller = new AbortController();

  // Infinity means no timeout
  let timer: NodeJS.Timeout | undefined;
  if (Number.isFinite(timeoutMs)) {
    timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);
    timer.unref();
  }

  const onExternalAbort = (): void => {
    controller.abort(external?.reason);
  };

  if (external?.aborted) {
    onExternalAbort();
  } else {
    external?.addEventListener("abort", onExternalAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      external?.removeEventListener("abort", onExternalAbort);
    },
  };
}

/** Human-readable reason of an aborted signal */
export function abortMessage(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason.message;
  return reason === undefined ? "aborted" : String(reason);
}

/**
 * Resolves or rejects with `promise`, or rejects with the abort reason as
 * soon as `signal` fires. A late rejection of the abandoned promise is logged.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      promise.catch((err: unknown) => {
        console.warn(
          `   ⚠  Ignoring failure that arrived after abort: ${err instanceof Error ? err.message : String(err)}`
        );
      });
      reject(signal.reason);
    };

    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}
