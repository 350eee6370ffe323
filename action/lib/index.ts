/**
 * Library exports
 *
 * Central export point for the review-app pipeline.
 */

// Types
export type {
  AppStatusSnapshot,
  BuildSource,
  DeployRequest,
  EventContext,
  ExecutionResult,
  LifecycleDecision,
  LifecycleOutcome,
  PullRequestAction,
  ResolvedInputs,
  ReviewAppIdentity,
  VmSizing,
} from "./types.js";

// Errors
export {
  ConfigurationError,
  FlyCommandError,
  InvalidEventPayloadError,
  InvalidInputError,
  MissingPRNumberError,
  UnsafeAppNameError,
  isConfigurationError,
} from "./errors.js";

// Input resolution
export { readEventContext, parseEventPayload } from "./event.js";
export { readActionInputs, resolveInputs } from "./inputs.js";
export type { ActionInputs, InputReader, ResolveOptions } from "./inputs.js";

// Lifecycle
export { decideLifecycle, requiresStatusProbe } from "./lifecycle.js";

// Execution
export { executeDecision } from "./executor.js";
export type { ReviewAppPlatform } from "./executor.js";
export { FlyClient, createFlyClient } from "./fly-client.js";
export { createSpawnRunner } from "./command-runner.js";
export type { CommandRunner, CommandResult, CommandOptions } from "./command-runner.js";
export { bestEffort } from "./best-effort.js";
export type { FailurePolicy, BestEffortOutcome } from "./best-effort.js";

// Outputs
export { buildOutputs, writeOutputs } from "./outputs.js";
export type { ReviewAppOutputs, OutputWriter } from "./outputs.js";

// Logging
export { logger, createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
