import { logger } from "./logger.js";

type IntervalCallback = () => void | Promise<void>;

const activeIntervals = new Map<NodeJS.Timeout, string>();

/**
 * Register a background loop. Ticks never overlap: a tick that is still
 * running when the next one fires is skipped. The timer is unref'd so a
 * forgotten loop never holds the process open.
 */
export function registerInterval(
  callback: IntervalCallback,
  intervalMs: number,
  label: string
): NodeJS.Timeout {
  let running = false;

  const wrappedCallback = () => {
    if (running) {
      logger.debug("Interval tick skipped, previous run still active", { label });
      return;
    }
    running = true;

    void Promise.resolve()
      .then(callback)
      .catch((error: unknown) => {
        logger.error("Interval callback failed", { label, error });
      })
      .finally(() => {
        running = false;
      });
  };

  const handle = setInterval(wrappedCallback, intervalMs);
  handle.unref();
  activeIntervals.set(handle, label);
  return handle;
}

export function clearRegisteredInterval(handle: NodeJS.Timeout): void {
  clearInterval(handle);
  activeIntervals.delete(handle);
}

export function clearAllIntervals(): void {
  for (const [handle, label] of activeIntervals.entries()) {
    clearInterval(handle);
    logger.info("Cleared interval", { label });
    activeIntervals.delete(handle);
  }
}

export function activeIntervalLabels(): string[] {
  return Array.from(activeIntervals.values());
}
