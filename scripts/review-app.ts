/**
 * Review App Lifecycle
 *
 * Entry point of the action. Resolves inputs from the pull request event,
 * decides between destroy/create/update/noop from the app's live state,
 * runs the matching flyctl commands and publishes the step outputs.
 */

import {
  createFlyClient,
  createSpawnRunner,
  decideLifecycle,
  executeDecision,
  logger,
  readActionInputs,
  readEventContext,
  requiresStatusProbe,
  resolveInputs,
  buildOutputs,
  writeOutputs,
} from "../action/lib/index.js";
import type {
  ExecutionResult,
  FlyClient,
  InputReader,
  OutputWriter,
  ReviewAppPlatform,
} from "../action/lib/index.js";
import { getEventPath } from "../action/config.js";
import { MISSING_APP } from "../action/lib/fly-client.js";
import { inGroup, runIfMain } from "./shared/run-action.js";

export type LifecyclePlatform = ReviewAppPlatform & Pick<FlyClient, "probe" | "version">;

export interface ReviewAppDependencies {
  env: NodeJS.ProcessEnv;
  cwd: string;
  getInput?: InputReader;
  setOutput?: OutputWriter;
  /** Called once inputs are resolved, with the app's working directory */
  createPlatform: (workingDirectory: string) => LifecyclePlatform;
}

function defaultDependencies(): ReviewAppDependencies {
  const runner = createSpawnRunner({
    onStdout: (chunk) => process.stdout.write(chunk),
    onStderr: (chunk) => process.stderr.write(chunk),
  });
  return {
    env: process.env,
    cwd: process.cwd(),
    createPlatform: (workingDirectory) => createFlyClient(runner, { cwd: workingDirectory }),
  };
}

/**
 * Run the full pipeline once. Exported for testing.
 */
export async function runReviewApp(
  deps: ReviewAppDependencies = defaultDependencies()
): Promise<ExecutionResult> {
  const { event, identity, request } = await inGroup("Resolve inputs", async () => {
    const event = readEventContext(getEventPath(deps.env), deps.env);
    const resolved = resolveInputs(readActionInputs(deps.getInput), event, {
      env: deps.env,
      cwd: deps.cwd,
    });
    logger.info(
      `PR #${event.prNumber} (${event.action}) → app ${resolved.identity.name} in ${resolved.identity.region}`
    );
    return { event, ...resolved };
  });

  const platform = deps.createPlatform(request.workingDirectory);
  logger.info(`Using ${await platform.version()}`);

  const snapshot = requiresStatusProbe(event.action) ? await platform.probe(identity.name) : MISSING_APP;
  const decision = decideLifecycle(event.action, snapshot);
  logger.info(`Decision for ${identity.name}: ${decision} (app ${snapshot.exists ? "exists" : "absent"})`);

  const result = await inGroup(`Review app: ${decision}`, () =>
    executeDecision(decision, identity, request, platform)
  );

  writeOutputs(buildOutputs(identity, result), deps.setOutput);
  logger.info(result.message);
  return result;
}

async function main(): Promise<void> {
  await runReviewApp();
}

runIfMain(import.meta.url, main);
