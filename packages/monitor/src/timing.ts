/** Longest delay a single Node timer honours; longer ones fire after 1ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const deadline = Date.now() + Math.max(0, ms);
    let timer: ReturnType<typeof setTimeout> | undefined;
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    // Long waits are chained in timer-sized chunks
    const arm = (remaining: number) => {
      timer = setTimeout(() => {
        const left = deadline - Date.now();
        if (left > 0) arm(left);
        else done();
      }, Math.min(remaining, MAX_TIMER_MS));
    };
    arm(Math.max(0, ms));
    signal?.addEventListener('abort', done, { once: true });
  });
}

/** Resolves true if `promise` settles within `ms`, false on timeout. */
export async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | null = null;
  const timeout = new Promise<false>(resolve => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([promise.then(() => true, () => true), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
