/**
 * Shared Types
 *
 * Data model flowing through the resolver → controller → executor pipeline.
 */

// ───────────────────────────────────────────────────────────────────────────────
// Event
// ───────────────────────────────────────────────────────────────────────────────

export type PullRequestAction = "opened" | "synchronize" | "closed" | "other";

export interface EventContext {
  action: PullRequestAction;
  prNumber: number;
  /** Undefined when neither the payload nor GITHUB_REPOSITORY carries it */
  repositoryOwner?: string;
  repositoryName?: string;
}

// ───────────────────────────────────────────────────────────────────────────────
// Resolved Inputs
// ───────────────────────────────────────────────────────────────────────────────

export interface ReviewAppIdentity {
  readonly name: string;
  readonly region: string;
  readonly org: string;
}

export type BuildSource =
  | { kind: "image"; ref: string }
  | { kind: "dockerfile"; ref: string }
  | { kind: "default" };

export type VmSizing =
  | { kind: "preset"; size: string }
  | { kind: "custom"; cpuKind?: string; cpus?: number; memory?: string }
  | { kind: "default" };

export interface DeployRequest {
  readonly source: BuildSource;
  /** KEY=VALUE entries, in input order */
  readonly buildArgs: readonly string[];
  readonly ha: boolean;
  readonly sizing: VmSizing;
  readonly waitForCompletion: boolean;
  /** Absolute path of the deployment config file */
  readonly configPath: string;
  readonly workingDirectory: string;
  /** KEY=VALUE entries forwarded to secret storage */
  readonly secrets: readonly string[];
  readonly postgresApp?: string;
}

export interface ResolvedInputs {
  readonly identity: ReviewAppIdentity;
  readonly request: DeployRequest;
}

// ───────────────────────────────────────────────────────────────────────────────
// Platform State & Lifecycle
// ───────────────────────────────────────────────────────────────────────────────

export interface AppStatusSnapshot {
  exists: boolean;
  hostname: string;
  id: string;
}

export type LifecycleDecision = "destroy" | "create" | "update" | "noop";

export type LifecycleOutcome = "Destroyed" | "Created" | "Updated" | "NoOp";

export interface ExecutionResult {
  outcome: LifecycleOutcome;
  message: string;
  /** Absent after a destroy */
  status?: AppStatusSnapshot;
}
