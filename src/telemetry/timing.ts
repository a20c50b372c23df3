import { logger } from '../config/logger';

export interface Timer {
  /** Logs the elapsed time under the timer's label and returns it in ms. */
  stop: (fields?: Record<string, unknown>) => number;
}

/**
 * Measures one operation.
 *   const timer = startTimer('service.dispatch');
 *   await send();
 *   timer.stop({ channel }); // logs timer.stop at debug
 */
export function startTimer(label: string): Timer {
  const start = performance.now();

  return {
    stop(fields = {}): number {
      const durationMs = Math.round(performance.now() - start);
      logger.debug({ ...fields, label, durationMs }, 'timer.stop');
      return durationMs;
    },
  };
}
