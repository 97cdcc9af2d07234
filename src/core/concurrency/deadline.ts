/**
 * Runs `task` with an abort signal that fires after `timeoutMs`. When the
 * deadline passes first the returned promise rejects with `onTimeout()`,
 * whatever the task later does. A missing or non-positive timeout disables
 * the deadline.
 */
export async function withDeadline<T>(
  timeoutMs: number | undefined,
  task: (signal: AbortSignal) => Promise<T>,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  if (!timeoutMs || timeoutMs <= 0) {
    return task(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = onTimeout();
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
