/**
 * Error Types
 *
 * Configuration errors are raised before any platform command runs.
 * Command errors carry the failed invocation for the workflow log.
 */

export type ConfigurationErrorCode =
  | "MissingPRNumber"
  | "UnsafeAppName"
  | "InvalidInput"
  | "InvalidEventPayload";

export class ConfigurationError extends Error {
  constructor(
    readonly code: ConfigurationErrorCode,
    message: string
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class MissingPRNumberError extends ConfigurationError {
  constructor() {
    super("MissingPRNumber", "This action only supports pull_request events.");
    this.name = "MissingPRNumberError";
  }
}

export class UnsafeAppNameError extends ConfigurationError {
  constructor(
    readonly appName: string,
    readonly prNumber: number
  ) {
    super(
      "UnsafeAppName",
      `For safety, this action requires the app's name to contain the PR number (got "${appName}" for PR #${prNumber}).`
    );
    this.name = "UnsafeAppNameError";
  }
}

export class InvalidInputError extends ConfigurationError {
  constructor(message: string) {
    super("InvalidInput", message);
    this.name = "InvalidInputError";
  }
}

export class InvalidEventPayloadError extends ConfigurationError {
  constructor(message: string) {
    super("InvalidEventPayload", message);
    this.name = "InvalidEventPayloadError";
  }
}

/**
 * A flyctl invocation exited non-zero (or could not be started).
 */
export class FlyCommandError extends Error {
  constructor(
    readonly args: readonly string[],
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    const detail = stderr.trim() ? `: ${stderr.trim()}` : "";
    super(`flyctl ${args.join(" ")} failed with exit code ${exitCode ?? "unknown"}${detail}`);
    this.name = "FlyCommandError";
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
