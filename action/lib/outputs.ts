/**
 * Step Outputs
 *
 * Maps an execution result onto the action's outputs for downstream steps.
 */

import * as core from "@actions/core";
import { OUTPUT_KEYS, type OutputKey } from "../config.js";
import type { ExecutionResult, ReviewAppIdentity } from "./types.js";

export type ReviewAppOutputs = Partial<Record<OutputKey, string>>;

export function buildOutputs(identity: ReviewAppIdentity, result: ExecutionResult): ReviewAppOutputs {
  const outputs: ReviewAppOutputs = {
    [OUTPUT_KEYS.name]: identity.name,
    [OUTPUT_KEYS.message]: result.message,
  };
  if (result.status) {
    outputs[OUTPUT_KEYS.hostname] = result.status.hostname;
    outputs[OUTPUT_KEYS.url] = `https://${result.status.hostname}`;
    outputs[OUTPUT_KEYS.id] = result.status.id;
  }
  return outputs;
}

export type OutputWriter = (name: string, value: string) => void;

export function writeOutputs(
  outputs: ReviewAppOutputs,
  setOutput: OutputWriter = (name, value) => core.setOutput(name, value)
): void {
  for (const [key, value] of Object.entries(outputs)) {
    if (value !== undefined) {
      setOutput(key, value);
    }
  }
}
