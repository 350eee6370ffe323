/**
 * Action Executor
 *
 * Carries out a lifecycle decision against the platform and reports the
 * resulting app status.
 *
 * Failure handling per step:
 * - launch, deploy, final status: fatal
 * - destroy: ignored (an absent app is already the desired state)
 * - secrets import, postgres attach: warned and skipped
 */

import { STATUS_MESSAGES } from "../config.js";
import { bestEffort } from "./best-effort.js";
import { withPreservedFile } from "./config-file.js";
import type { FlyClient } from "./fly-client.js";
import { outcomeFor } from "./lifecycle.js";
import { logger } from "./logger.js";
import type {
  DeployRequest,
  ExecutionResult,
  LifecycleDecision,
  ReviewAppIdentity,
} from "./types.js";

/**
 * Platform operations the executor needs.
 */
export type ReviewAppPlatform = Pick<
  FlyClient,
  "launch" | "deploy" | "destroy" | "importSecrets" | "attachPostgres" | "status"
>;

async function importSecrets(
  platform: ReviewAppPlatform,
  identity: ReviewAppIdentity,
  request: DeployRequest
): Promise<void> {
  if (request.secrets.length === 0) {
    return;
  }
  await bestEffort("warn", `Importing ${request.secrets.length} secret(s)`, () =>
    platform.importSecrets(identity.name, request.secrets)
  );
}

async function create(
  platform: ReviewAppPlatform,
  identity: ReviewAppIdentity,
  request: DeployRequest
): Promise<void> {
  logger.info(`Provisioning ${identity.name} in ${identity.region} (org ${identity.org})`);
  await withPreservedFile(request.configPath, () => platform.launch(identity, request));

  await importSecrets(platform, identity, request);

  if (request.postgresApp) {
    const postgresApp = request.postgresApp;
    await bestEffort("warn", `Attaching postgres app ${postgresApp}`, () =>
      platform.attachPostgres(postgresApp, identity.name)
    );
  }

  await platform.deploy(identity, request);
}

async function update(
  platform: ReviewAppPlatform,
  identity: ReviewAppIdentity,
  request: DeployRequest
): Promise<void> {
  logger.info(`Redeploying ${identity.name}`);
  await importSecrets(platform, identity, request);
  await platform.deploy(identity, request);
}

type MutatingDecision = Exclude<LifecycleDecision, "destroy">;

async function apply(
  decision: MutatingDecision,
  platform: ReviewAppPlatform,
  identity: ReviewAppIdentity,
  request: DeployRequest
): Promise<string> {
  switch (decision) {
    case "create":
      await create(platform, identity, request);
      return STATUS_MESSAGES.created;
    case "update":
      await update(platform, identity, request);
      return STATUS_MESSAGES.updated;
    case "noop":
      logger.info(`Nothing to do for ${identity.name}`);
      return STATUS_MESSAGES.unchanged;
  }
}

export async function executeDecision(
  decision: LifecycleDecision,
  identity: ReviewAppIdentity,
  request: DeployRequest,
  platform: ReviewAppPlatform
): Promise<ExecutionResult> {
  if (decision === "destroy") {
    logger.info(`Destroying ${identity.name}`);
    await bestEffort("ignore", `Destroying ${identity.name}`, () => platform.destroy(identity.name));
    return { outcome: outcomeFor(decision), message: STATUS_MESSAGES.destroyed };
  }

  const message = await apply(decision, platform, identity, request);
  const status = await platform.status(identity.name);
  return { outcome: outcomeFor(decision), message, status };
}
