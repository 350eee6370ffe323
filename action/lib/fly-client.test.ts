import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import {
  FlyClient,
  MISSING_APP,
  buildDeployArgs,
  buildLaunchArgs,
  createFlyClient,
  parseStatusDocument,
  sizingArgs,
} from "./fly-client.js";
import type { CommandResult, CommandRunner } from "./command-runner.js";
import { FlyCommandError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { DeployRequest, ReviewAppIdentity } from "./types.js";

const identity: ReviewAppIdentity = { name: "pr-42-acme-widgets", region: "ord", org: "personal" };

const baseRequest: DeployRequest = {
  source: { kind: "default" },
  buildArgs: [],
  ha: false,
  sizing: { kind: "default" },
  waitForCompletion: false,
  configPath: "/work/fly.toml",
  workingDirectory: "/work",
  secrets: [],
};

const ok = (stdout = ""): CommandResult => ({ exitCode: 0, stdout, stderr: "" });

describe("argument builders", () => {
  it("should build launch args without deploying", () => {
    expect(buildLaunchArgs(identity, baseRequest)).toEqual([
      "launch",
      "--no-deploy",
      "--copy-config",
      "--name",
      "pr-42-acme-widgets",
      "--regions",
      "ord",
      "--org",
      "personal",
      "--ha=false",
      "--config",
      "/work/fly.toml",
    ]);
  });

  it("should add source, sizing and each build arg as a discrete flag", () => {
    const request: DeployRequest = {
      ...baseRequest,
      source: { kind: "dockerfile", ref: "Dockerfile.review" },
      sizing: { kind: "preset", size: "shared-cpu-2x" },
      buildArgs: ["A=1", "B=two words"],
      ha: true,
    };
    expect(buildLaunchArgs(identity, request)).toEqual([
      "launch",
      "--no-deploy",
      "--copy-config",
      "--name",
      "pr-42-acme-widgets",
      "--dockerfile",
      "Dockerfile.review",
      "--regions",
      "ord",
      "--org",
      "personal",
      "--ha=true",
      "--vm-size",
      "shared-cpu-2x",
      "--build-arg",
      "A=1",
      "--build-arg",
      "B=two words",
      "--config",
      "/work/fly.toml",
    ]);
  });

  it("should build detached deploy args by default", () => {
    expect(buildDeployArgs(identity, { ...baseRequest, source: { kind: "image", ref: "app:1" } })).toEqual([
      "deploy",
      "--config",
      "/work/fly.toml",
      "--app",
      "pr-42-acme-widgets",
      "--regions",
      "ord",
      "--image",
      "app:1",
      "--strategy",
      "immediate",
      "--remote-only",
      "--ha=false",
      "--detach",
    ]);
  });

  it("should omit --detach when waiting for completion", () => {
    expect(buildDeployArgs(identity, { ...baseRequest, waitForCompletion: true })).not.toContain("--detach");
  });

  it("should emit only the custom sizing flags that are set", () => {
    expect(sizingArgs({ kind: "custom", cpus: 2 })).toEqual(["--vm-cpus", "2"]);
    expect(sizingArgs({ kind: "custom", cpuKind: "performance", memory: "2048" })).toEqual([
      "--vm-cpu-kind",
      "performance",
      "--vm-memory",
      "2048",
    ]);
  });
});

describe("parseStatusDocument", () => {
  it("should read Hostname and ID", () => {
    expect(
      parseStatusDocument(JSON.stringify({ ID: "pr-42-acme-widgets", Hostname: "pr-42-acme-widgets.fly.dev" }))
    ).toEqual({ exists: true, hostname: "pr-42-acme-widgets.fly.dev", id: "pr-42-acme-widgets" });
  });

  it("should reject invalid JSON", () => {
    expect(() => parseStatusDocument("Error: not found")).toThrow(/invalid JSON/);
  });

  it("should reject documents without an ID", () => {
    expect(() => parseStatusDocument(JSON.stringify({ Hostname: "x.fly.dev" }))).toThrow(
      "flyctl status returned an unexpected document: ID"
    );
  });
});

describe("FlyClient", () => {
  let run: Mock<CommandRunner["run"]>;
  let log: Logger;
  let client: FlyClient;

  beforeEach(() => {
    run = vi.fn<CommandRunner["run"]>().mockResolvedValue(ok());
    log = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
      group: vi.fn(),
      groupEnd: vi.fn(),
      command: vi.fn(),
    };
    client = createFlyClient({ run }, { cwd: "/work", logger: log });
  });

  it("should run flyctl in the working directory and echo the command", async () => {
    await client.destroy("pr-42-acme-widgets");

    expect(run).toHaveBeenCalledWith("flyctl", ["apps", "destroy", "pr-42-acme-widgets", "-y"], {
      cwd: "/work",
      input: undefined,
    });
    expect(log.command).toHaveBeenCalledWith("flyctl", ["apps", "destroy", "pr-42-acme-widgets", "-y"]);
  });

  it("should honour a custom binary", async () => {
    const custom = createFlyClient({ run }, { cwd: "/work", binary: "fly", logger: log });
    await custom.version();
    expect(run).toHaveBeenCalledWith("fly", ["version"], expect.anything());
  });

  it("should throw FlyCommandError on a non-zero exit", async () => {
    run.mockResolvedValue({ exitCode: 1, stdout: "", stderr: "Error: build failed\n" });

    const deploy = client.deploy(identity, baseRequest);

    await expect(deploy).rejects.toBeInstanceOf(FlyCommandError);
    await expect(deploy).rejects.toMatchObject({ exitCode: 1, stderr: "Error: build failed\n" });
    await expect(deploy).rejects.toThrow("failed with exit code 1: Error: build failed");
  });

  it("should report a missing app from a failing probe", async () => {
    run.mockResolvedValue({ exitCode: 1, stdout: "", stderr: "Could not find App" });
    await expect(client.probe("pr-42-acme-widgets")).resolves.toEqual(MISSING_APP);
  });

  it("should parse the status of an existing app from the probe", async () => {
    run.mockResolvedValue(ok(JSON.stringify({ ID: "abc", Hostname: "abc.fly.dev" })));
    await expect(client.probe("abc")).resolves.toEqual({ exists: true, hostname: "abc.fly.dev", id: "abc" });
    expect(run).toHaveBeenCalledWith("flyctl", ["status", "--app", "abc", "--json"], expect.anything());
  });

  it("should treat a failing status call as fatal", async () => {
    run.mockResolvedValue({ exitCode: 2, stdout: "", stderr: "" });
    await expect(client.status("abc")).rejects.toThrow(FlyCommandError);
  });

  it("should send secrets over stdin", async () => {
    await client.importSecrets("pr-42-acme-widgets", ["API_KEY=test-secret", "DEBUG=1"]);
    expect(run).toHaveBeenCalledWith("flyctl", ["secrets", "import", "--app", "pr-42-acme-widgets"], {
      cwd: "/work",
      input: "API_KEY=test-secret\nDEBUG=1\n",
    });
  });

  it("should attach postgres to the app", async () => {
    await client.attachPostgres("pr-42-db", "pr-42-acme-widgets");
    expect(run).toHaveBeenCalledWith(
      "flyctl",
      ["postgres", "attach", "pr-42-db", "--app", "pr-42-acme-widgets"],
      expect.anything()
    );
  });

  it("should return trimmed version output", async () => {
    run.mockResolvedValue(ok("flyctl v0.3.0 linux/amd64\n"));
    await expect(client.version()).resolves.toBe("flyctl v0.3.0 linux/amd64");
  });
});
