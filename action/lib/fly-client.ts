/**
 * flyctl Client
 *
 * Typed wrapper over the flyctl CLI. Each operation assembles an argument
 * array from the resolved identity and deploy request; nothing is ever
 * concatenated into a shell string.
 */

import { z } from "zod";
import { FLYCTL_BINARY } from "../config.js";
import type { CommandResult, CommandRunner } from "./command-runner.js";
import { FlyCommandError } from "./errors.js";
import { formatHaFlag } from "./inputs.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import type {
  AppStatusSnapshot,
  BuildSource,
  DeployRequest,
  ReviewAppIdentity,
  VmSizing,
} from "./types.js";

// ───────────────────────────────────────────────────────────────────────────────
// Argument Builders
// ───────────────────────────────────────────────────────────────────────────────

export function sourceArgs(source: BuildSource): string[] {
  switch (source.kind) {
    case "image":
      return ["--image", source.ref];
    case "dockerfile":
      return ["--dockerfile", source.ref];
    case "default":
      return [];
  }
}

export function sizingArgs(sizing: VmSizing): string[] {
  switch (sizing.kind) {
    case "preset":
      return ["--vm-size", sizing.size];
    case "custom": {
      const args: string[] = [];
      if (sizing.cpuKind !== undefined) args.push("--vm-cpu-kind", sizing.cpuKind);
      if (sizing.cpus !== undefined) args.push("--vm-cpus", String(sizing.cpus));
      if (sizing.memory !== undefined) args.push("--vm-memory", sizing.memory);
      return args;
    }
    case "default":
      return [];
  }
}

export function buildArgFlags(buildArgs: readonly string[]): string[] {
  return buildArgs.flatMap((arg) => ["--build-arg", arg]);
}

/**
 * Provision without deploying. `--copy-config` keeps the existing config file
 * as the base, though flyctl still rewrites its build section.
 */
export function buildLaunchArgs(identity: ReviewAppIdentity, request: DeployRequest): string[] {
  return [
    "launch",
    "--no-deploy",
    "--copy-config",
    "--name",
    identity.name,
    ...sourceArgs(request.source),
    "--regions",
    identity.region,
    "--org",
    identity.org,
    formatHaFlag(request.ha),
    ...sizingArgs(request.sizing),
    ...buildArgFlags(request.buildArgs),
    "--config",
    request.configPath,
  ];
}

export function buildDeployArgs(identity: ReviewAppIdentity, request: DeployRequest): string[] {
  return [
    "deploy",
    "--config",
    request.configPath,
    "--app",
    identity.name,
    "--regions",
    identity.region,
    ...sourceArgs(request.source),
    "--strategy",
    "immediate",
    "--remote-only",
    formatHaFlag(request.ha),
    ...(request.waitForCompletion ? [] : ["--detach"]),
    ...sizingArgs(request.sizing),
    ...buildArgFlags(request.buildArgs),
  ];
}

// ───────────────────────────────────────────────────────────────────────────────
// Status Parsing
// ───────────────────────────────────────────────────────────────────────────────

const StatusDocumentSchema = z
  .object({
    ID: z.string(),
    Hostname: z.string().default(""),
  })
  .passthrough();

export const MISSING_APP: AppStatusSnapshot = Object.freeze({ exists: false, hostname: "", id: "" });

/**
 * Parse `flyctl status --json` output into a snapshot.
 *
 * @throws Error when stdout is not a status document
 */
export function parseStatusDocument(stdout: string): AppStatusSnapshot {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (error) {
    throw new Error(`flyctl status returned invalid JSON: ${(error as Error).message}`);
  }
  const parsed = StatusDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(
      `flyctl status returned an unexpected document: ${parsed.error.issues.map((i) => i.path.join(".")).join(", ")}`
    );
  }
  return { exists: true, hostname: parsed.data.Hostname, id: parsed.data.ID };
}

// ───────────────────────────────────────────────────────────────────────────────
// Client
// ───────────────────────────────────────────────────────────────────────────────

export interface FlyClientOptions {
  /** Working directory for every invocation */
  cwd: string;
  binary?: string;
  logger?: Logger;
}

export class FlyClient {
  private readonly binary: string;
  private readonly log: Logger;

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: FlyClientOptions
  ) {
    this.binary = options.binary ?? FLYCTL_BINARY;
    this.log = options.logger ?? defaultLogger;
  }

  async version(): Promise<string> {
    const result = await this.exec(["version"]);
    return result.stdout.trim();
  }

  /**
   * Existence probe. A failing status call means the app does not exist.
   */
  async probe(appName: string): Promise<AppStatusSnapshot> {
    const result = await this.exec(["status", "--app", appName, "--json"], { allowFailure: true });
    if (result.exitCode !== 0) {
      this.log.debug(`flyctl status exited ${result.exitCode ?? "unknown"}; treating ${appName} as absent`);
      return MISSING_APP;
    }
    return parseStatusDocument(result.stdout);
  }

  /**
   * Status of an app that must exist.
   */
  async status(appName: string): Promise<AppStatusSnapshot> {
    const result = await this.exec(["status", "--app", appName, "--json"]);
    return parseStatusDocument(result.stdout);
  }

  async launch(identity: ReviewAppIdentity, request: DeployRequest): Promise<void> {
    await this.exec(buildLaunchArgs(identity, request));
  }

  async deploy(identity: ReviewAppIdentity, request: DeployRequest): Promise<void> {
    await this.exec(buildDeployArgs(identity, request));
  }

  async destroy(appName: string): Promise<void> {
    await this.exec(["apps", "destroy", appName, "-y"]);
  }

  /**
   * Secrets go over stdin so values never appear in the process list or log.
   */
  async importSecrets(appName: string, secrets: readonly string[]): Promise<void> {
    await this.exec(["secrets", "import", "--app", appName], { input: `${secrets.join("\n")}\n` });
  }

  async attachPostgres(postgresApp: string, appName: string): Promise<void> {
    await this.exec(["postgres", "attach", postgresApp, "--app", appName]);
  }

  private async exec(
    args: string[],
    opts: { allowFailure?: boolean; input?: string } = {}
  ): Promise<CommandResult> {
    this.log.command(this.binary, args);
    const result = await this.runner.run(this.binary, args, {
      cwd: this.options.cwd,
      input: opts.input,
    });
    if (result.exitCode !== 0 && !opts.allowFailure) {
      throw new FlyCommandError(args, result.exitCode, result.stderr);
    }
    return result;
  }
}

export function createFlyClient(runner: CommandRunner, options: FlyClientOptions): FlyClient {
  return new FlyClient(runner, options);
}
