import { logger } from '../config/logger';

export interface Timer {
  /** Logs and returns the elapsed milliseconds. */
  stop(extra?: Record<string, unknown>): number;
}

/**
 * Measures one operation.
 *   const timer = startTimer('pms.getFolio', { reservationId });
 *   await backend.getFolio(reservationId);
 *   timer.stop({ found: true });
 */
export function startTimer(label: string, context: Record<string, unknown> = {}): Timer {
  const start = performance.now();

  return {
    stop(extra?: Record<string, unknown>): number {
      const durationMs = Math.round(performance.now() - start);
      logger.debug({ label, durationMs, ...context, ...extra }, 'Timer completed');
      return durationMs;
    },
  };
}
