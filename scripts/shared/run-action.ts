/**
 * Shared Action Runner
 *
 * Entry-point plumbing for action scripts: log grouping around each stage
 * and uniform failure reporting through @actions/core.
 */

import * as core from "@actions/core";
import { isConfigurationError, logger } from "../../action/lib/index.js";

/**
 * Run `fn` inside a collapsible log group.
 */
export async function inGroup<T>(name: string, fn: () => Promise<T>): Promise<T> {
  logger.group(name);
  try {
    return await fn();
  } finally {
    logger.groupEnd();
  }
}

/**
 * Report a fatal error and mark the step failed.
 */
export function reportFailure(error: unknown): void {
  if (isConfigurationError(error)) {
    core.setFailed(`${error.code}: ${error.message}`);
    return;
  }
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error("Review app action failed", err);
  core.setFailed(`Fatal error: ${err.message}`);
}

/**
 * Standard entry point guard for scripts.
 * Runs main() only when the script is executed directly (not imported for testing).
 *
 * @param callerUrl - Pass `import.meta.url` from the calling module
 * @param main - The async main function to run
 */
export function runIfMain(callerUrl: string, main: () => Promise<void>): void {
  const entryUrl = process.argv[1] ? new URL(process.argv[1], "file://").href : "";
  if (callerUrl === entryUrl) {
    main().catch((error: unknown) => {
      reportFailure(error);
      process.exit(1);
    });
  }
}
