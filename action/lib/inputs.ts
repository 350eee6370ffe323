/**
 * Input Resolution
 *
 * Turns raw action inputs and the triggering event into an immutable
 * ReviewAppIdentity and DeployRequest. Every check here runs before any
 * flyctl command, so a misconfigured workflow fails without touching the
 * platform.
 *
 * Fallback order (highest priority first):
 * 1. Action input (`with:` in the workflow)
 * 2. Platform environment variable (FLY_REGION / FLY_ORG)
 * 3. Hardcoded fallback
 */

import * as path from "node:path";
import * as core from "@actions/core";
import { DEFAULT_CONFIG_FILE, PLATFORM_DEFAULTS } from "../config.js";
import { InvalidInputError, UnsafeAppNameError } from "./errors.js";
import { logger } from "./logger.js";
import type {
  BuildSource,
  DeployRequest,
  EventContext,
  ResolvedInputs,
  ReviewAppIdentity,
  VmSizing,
} from "./types.js";

// ───────────────────────────────────────────────────────────────────────────────
// Raw Inputs
// ───────────────────────────────────────────────────────────────────────────────

export interface ActionInputs {
  path?: string;
  name?: string;
  region?: string;
  org?: string;
  image?: string;
  dockerfile?: string;
  config?: string;
  buildArgs?: string;
  secrets?: string;
  postgres?: string;
  ha?: string;
  wait?: string;
  vmsize?: string;
  cpukind?: string;
  cpu?: string;
  memory?: string;
}

export type InputReader = (name: string) => string;

/**
 * Trim an input and treat empty or whitespace-only values as unset.
 */
export function normalizeInput(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Read all recognised inputs. Multi-line inputs keep their inner newlines.
 */
export function readActionInputs(getInput: InputReader = (name) => core.getInput(name)): ActionInputs {
  const read = (name: string) => normalizeInput(getInput(name));
  return {
    path: read("path"),
    name: read("name"),
    region: read("region"),
    org: read("org"),
    image: read("image"),
    dockerfile: read("dockerfile"),
    config: read("config"),
    buildArgs: read("build_args"),
    secrets: read("secrets"),
    postgres: read("postgres"),
    ha: read("ha"),
    wait: read("wait"),
    vmsize: read("vmsize"),
    cpukind: read("cpukind"),
    cpu: read("cpu"),
    memory: read("memory"),
  };
}

// ───────────────────────────────────────────────────────────────────────────────
// Normalisers
// ───────────────────────────────────────────────────────────────────────────────

/** Inputs whose entries are never echoed back in error messages. */
const SENSITIVE_INPUTS: ReadonlySet<string> = new Set(["secrets"]);

/**
 * Split a whitespace/newline separated list of KEY=VALUE entries.
 * Order is preserved; entries without a key are rejected.
 */
export function parseKeyValueList(raw: string | undefined, inputName: string): string[] {
  if (!raw) {
    return [];
  }
  const entries = raw.split(/\s+/).filter((entry) => entry.length > 0);
  entries.forEach((entry, index) => {
    if (entry.indexOf("=") <= 0) {
      // Secret values may contain spaces, so a fragment could be part of one
      const shown = SENSITIVE_INPUTS.has(inputName) ? `entry #${index + 1}` : `"${entry}"`;
      throw new InvalidInputError(`Input "${inputName}" expects KEY=VALUE entries, got ${shown}`);
    }
  });
  return entries;
}

/**
 * Accepts a raw boolean or a pre-formatted `--ha=<bool>` flag.
 */
export function parseHaFlag(raw: string | undefined): boolean {
  if (raw === undefined) {
    return false;
  }
  switch (raw.toLowerCase()) {
    case "true":
    case "--ha":
    case "--ha=true":
      return true;
    case "false":
    case "--ha=false":
      return false;
    default:
      throw new InvalidInputError(`Input "ha" must be true, false, --ha=true or --ha=false, got "${raw}"`);
  }
}

export function formatHaFlag(ha: boolean): string {
  return `--ha=${ha}`;
}

function resolveSource(inputs: ActionInputs): BuildSource {
  if (inputs.image) {
    if (inputs.dockerfile) {
      logger.warn(`Both "image" and "dockerfile" are set; deploying image ${inputs.image}`);
    }
    return { kind: "image", ref: inputs.image };
  }
  if (inputs.dockerfile) {
    return { kind: "dockerfile", ref: inputs.dockerfile };
  }
  return { kind: "default" };
}

function resolveSizing(inputs: ActionInputs): VmSizing {
  const hasCustom = inputs.cpukind !== undefined || inputs.cpu !== undefined || inputs.memory !== undefined;

  if (inputs.vmsize) {
    if (hasCustom) {
      throw new InvalidInputError(`Input "vmsize" cannot be combined with "cpukind", "cpu" or "memory"`);
    }
    return { kind: "preset", size: inputs.vmsize };
  }
  if (!hasCustom) {
    return { kind: "default" };
  }

  let cpus: number | undefined;
  if (inputs.cpu !== undefined) {
    cpus = Number(inputs.cpu);
    if (!Number.isInteger(cpus) || cpus <= 0) {
      throw new InvalidInputError(`Input "cpu" must be a positive integer, got "${inputs.cpu}"`);
    }
  }
  return { kind: "custom", cpuKind: inputs.cpukind, cpus, memory: inputs.memory };
}

function firstDefined(...candidates: Array<string | undefined>): string | undefined {
  return candidates.find((candidate) => candidate !== undefined);
}

// ───────────────────────────────────────────────────────────────────────────────
// Identity
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Derive the app name: explicit override, else `pr-{number}-{owner}-{repo}`.
 * Underscores become hyphens since app names may not contain them.
 *
 * @throws UnsafeAppNameError when the name does not contain the PR number
 */
export function resolveAppName(explicitName: string | undefined, event: EventContext): string {
  let name = explicitName;
  if (name === undefined) {
    if (!event.repositoryOwner || !event.repositoryName) {
      throw new InvalidInputError(
        `Unable to determine the repository from the event payload; set the "name" input`
      );
    }
    name = `pr-${event.prNumber}-${event.repositoryOwner}-${event.repositoryName}`;
  }

  const normalized = name.replace(/_/g, "-");
  if (!normalized.includes(String(event.prNumber))) {
    throw new UnsafeAppNameError(normalized, event.prNumber);
  }
  return normalized;
}

// ───────────────────────────────────────────────────────────────────────────────
// Resolution
// ───────────────────────────────────────────────────────────────────────────────

export interface ResolveOptions {
  env?: NodeJS.ProcessEnv;
  /** Base for a relative `path` input */
  cwd?: string;
}

export function resolveInputs(
  inputs: ActionInputs,
  event: EventContext,
  options: ResolveOptions = {}
): ResolvedInputs {
  const env = options.env ?? process.env;
  const workingDirectory = path.resolve(options.cwd ?? process.cwd(), inputs.path ?? ".");

  const identity: ReviewAppIdentity = Object.freeze({
    name: resolveAppName(inputs.name, event),
    region:
      firstDefined(inputs.region, normalizeInput(env[PLATFORM_DEFAULTS.region.env])) ??
      PLATFORM_DEFAULTS.region.fallback,
    org:
      firstDefined(inputs.org, normalizeInput(env[PLATFORM_DEFAULTS.org.env])) ??
      PLATFORM_DEFAULTS.org.fallback,
  });

  const request: DeployRequest = Object.freeze({
    source: resolveSource(inputs),
    buildArgs: Object.freeze(parseKeyValueList(inputs.buildArgs, "build_args")),
    ha: parseHaFlag(inputs.ha),
    sizing: resolveSizing(inputs),
    waitForCompletion: inputs.wait?.toLowerCase() === "true",
    configPath: path.resolve(workingDirectory, inputs.config ?? DEFAULT_CONFIG_FILE),
    workingDirectory,
    secrets: Object.freeze(parseKeyValueList(inputs.secrets, "secrets")),
    postgresApp: inputs.postgres,
  });

  return Object.freeze({ identity, request });
}
