/**
 * A signal that aborts when the parent aborts or when `timeoutMs` elapses,
 * whichever comes first. Call `dispose()` once the guarded call settles.
 */
export interface TimeoutSignal {
  signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
}

export function createTimeoutSignal(timeoutMs: number, parent?: AbortSignal): TimeoutSignal {
  const controller = new AbortController();
  let didTimeOut = false;

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  }

  const timer = setTimeout(() => {
    didTimeOut = true;
    controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timer.unref();

  return {
    signal: controller.signal,
    timedOut: () => didTimeOut,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
