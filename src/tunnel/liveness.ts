import { getErrorMessage, logJsonl } from '../common/logger.js';

export interface LivenessLoop {
  /**
   * Whether the loop is still scheduled.
   */
  readonly running: boolean;
  stop(): void;
}

/**
 * Calls `send` every `intervalMs`. The first failed send stops the loop; there is no retry.
 */
export function startLivenessLoop(send: () => Promise<void>, intervalMs: number): LivenessLoop {
  let timer: NodeJS.Timeout | undefined;
  let inFlight = false;

  const stop = (): void => {
    if (timer !== undefined) {
      clearInterval(timer);
      timer = undefined;
    }
  };

  const tick = async (): Promise<void> => {
    if (inFlight) {
      return;
    }

    inFlight = true;

    try {
      await send();
    } catch (error) {
      stop();
      logJsonl('WARN', 'liveness_write_failed', {
        error: getErrorMessage(error),
      });
    } finally {
      inFlight = false;
    }
  };

  timer = setInterval(() => {
    void tick();
  }, intervalMs);
  timer.unref();

  return {
    get running() {
      return timer !== undefined;
    },
    stop,
  };
}
