/**
 * Best-Effort Execution
 *
 * Each call site names how a failure is handled instead of relying on an
 * implicit "ignore errors" convention.
 *
 * - propagate: rethrow (the run aborts)
 * - warn:      log a warning and continue
 * - ignore:    log at debug level and continue
 */

import { logger as defaultLogger, type Logger } from "./logger.js";

export type FailurePolicy = "propagate" | "warn" | "ignore";

export type BestEffortOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

export async function bestEffort<T>(
  policy: FailurePolicy,
  label: string,
  operation: () => Promise<T>,
  log: Logger = defaultLogger
): Promise<BestEffortOutcome<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    switch (policy) {
      case "propagate":
        throw err;
      case "warn":
        log.warn(`${label} failed, continuing: ${err.message}`);
        break;
      case "ignore":
        log.debug(`${label} failed (ignored): ${err.message}`);
        break;
    }
    return { ok: false, error: err };
  }
}
