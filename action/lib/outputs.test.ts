import { describe, it, expect, vi } from "vitest";
import * as core from "@actions/core";
import { buildOutputs, writeOutputs } from "./outputs.js";
import { STATUS_MESSAGES } from "../config.js";

vi.mock("@actions/core", () => ({
  setOutput: vi.fn(),
}));

const identity = { name: "pr-42-acme-widgets", region: "ord", org: "personal" };

describe("buildOutputs", () => {
  it("should include hostname, url and id when status is known", () => {
    const outputs = buildOutputs(identity, {
      outcome: "Created",
      message: STATUS_MESSAGES.created,
      status: { exists: true, hostname: "pr-42-acme-widgets.fly.dev", id: "app-123" },
    });

    expect(outputs).toEqual({
      name: "pr-42-acme-widgets",
      message: STATUS_MESSAGES.created,
      hostname: "pr-42-acme-widgets.fly.dev",
      url: "https://pr-42-acme-widgets.fly.dev",
      id: "app-123",
    });
  });

  it("should only include name and message after a destroy", () => {
    expect(buildOutputs(identity, { outcome: "Destroyed", message: STATUS_MESSAGES.destroyed })).toEqual({
      name: "pr-42-acme-widgets",
      message: "Review app deleted.",
    });
  });
});

describe("writeOutputs", () => {
  it("should write through @actions/core by default", () => {
    writeOutputs({ name: "pr-42-acme-widgets", message: "Review app deleted." });

    expect(core.setOutput).toHaveBeenCalledWith("name", "pr-42-acme-widgets");
    expect(core.setOutput).toHaveBeenCalledWith("message", "Review app deleted.");
  });

  it("should accept a custom writer", () => {
    const written: Array<[string, string]> = [];
    writeOutputs({ id: "app-123" }, (name, value) => written.push([name, value]));
    expect(written).toEqual([["id", "app-123"]]);
  });
});
