/**
 * Review App Configuration
 *
 * Shared defaults, status messages and output keys for the review-app
 * lifecycle action.
 */

// ───────────────────────────────────────────────────────────────────────────────
// Platform Defaults
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Ordered fallback rules for region and org.
 * The action input wins, then the environment variable, then the fallback.
 */
export const PLATFORM_DEFAULTS = {
  region: { env: "FLY_REGION", fallback: "ord" },
  org: { env: "FLY_ORG", fallback: "personal" },
} as const;

export const DEFAULT_CONFIG_FILE = "fly.toml";

/** Executable invoked for every platform operation. */
export const FLYCTL_BINARY = "flyctl";

// ───────────────────────────────────────────────────────────────────────────────
// Event Payload
// ───────────────────────────────────────────────────────────────────────────────

/** Where Docker container actions see the event payload. */
export const DOCKER_EVENT_PATH = "/github/workflow/event.json";

/**
 * Resolve the event payload path: GITHUB_EVENT_PATH when set,
 * otherwise the Docker mount.
 */
export function getEventPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.GITHUB_EVENT_PATH || DOCKER_EVENT_PATH;
}

// ───────────────────────────────────────────────────────────────────────────────
// Messages & Outputs
// ───────────────────────────────────────────────────────────────────────────────

export const STATUS_MESSAGES = {
  destroyed: "Review app deleted.",
  created: "Review app created. It may take a few minutes for the app to deploy.",
  updated: "Review app updated. It may take a few minutes for your changes to be deployed.",
  unchanged: "Review app unchanged.",
} as const;

export const OUTPUT_KEYS = {
  hostname: "hostname",
  url: "url",
  id: "id",
  name: "name",
  message: "message",
} as const;

export type OutputKey = (typeof OUTPUT_KEYS)[keyof typeof OUTPUT_KEYS];
