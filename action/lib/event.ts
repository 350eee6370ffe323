/**
 * Event Payload Parsing
 *
 * Reads the webhook payload that triggered the workflow and extracts the
 * pull request number, action and repository coordinates. Only these
 * fields are consumed; the rest of the payload is ignored.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { InvalidEventPayloadError, MissingPRNumberError } from "./errors.js";
import type { EventContext, PullRequestAction } from "./types.js";

const PositiveInt = z.number().int().positive();

/**
 * Loose schema: malformed optional fields degrade to undefined instead of
 * rejecting the whole payload, so a non-numeric `number` surfaces as
 * MissingPRNumberError.
 */
export const EventPayloadSchema = z
  .object({
    action: z.string().optional().catch(undefined),
    number: PositiveInt.optional().catch(undefined),
    pull_request: z
      .object({ number: PositiveInt.optional().catch(undefined) })
      .passthrough()
      .optional()
      .catch(undefined),
    repository: z
      .object({
        name: z.string().min(1).optional().catch(undefined),
        owner: z
          .object({ login: z.string().min(1).optional().catch(undefined) })
          .passthrough()
          .optional()
          .catch(undefined),
      })
      .passthrough()
      .optional()
      .catch(undefined),
  })
  .passthrough();

export type EventPayload = z.infer<typeof EventPayloadSchema>;

function isHandledAction(action: string | undefined): action is Exclude<PullRequestAction, "other"> {
  return action === "opened" || action === "synchronize" || action === "closed";
}

/**
 * Collapse the webhook action onto the handled set; anything else is "other".
 */
export function toPullRequestAction(action: string | undefined): PullRequestAction {
  return isHandledAction(action) ? action : "other";
}

/**
 * Split GITHUB_REPOSITORY ("owner/name") into its parts.
 */
function parseRepositorySlug(slug: string | undefined): { owner?: string; name?: string } {
  if (!slug) {
    return {};
  }
  const [owner, name] = slug.split("/", 2);
  return { owner: owner || undefined, name: name || undefined };
}

/**
 * Build an EventContext from a decoded payload.
 *
 * @throws MissingPRNumberError when neither `number` nor `pull_request.number` is present
 * @throws InvalidEventPayloadError when the payload is not a JSON object
 */
export function parseEventPayload(
  payload: unknown,
  env: NodeJS.ProcessEnv = process.env
): EventContext {
  const parsed = EventPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new InvalidEventPayloadError(
      `Event payload is not a JSON object: ${parsed.error.issues[0]?.message ?? "unknown error"}`
    );
  }

  const event = parsed.data;
  const prNumber = event.number ?? event.pull_request?.number;
  if (prNumber === undefined) {
    throw new MissingPRNumberError();
  }

  const fallback = parseRepositorySlug(env.GITHUB_REPOSITORY);
  return {
    action: toPullRequestAction(event.action),
    prNumber,
    repositoryOwner: event.repository?.owner?.login ?? fallback.owner,
    repositoryName: event.repository?.name ?? fallback.name,
  };
}

/**
 * Read and parse the event payload file.
 */
export function readEventContext(
  path: string,
  env: NodeJS.ProcessEnv = process.env
): EventContext {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    throw new InvalidEventPayloadError(
      `Unable to read event payload at ${path}: ${(error as Error).message}`
    );
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new InvalidEventPayloadError(
      `Event payload at ${path} is not valid JSON: ${(error as Error).message}`
    );
  }

  return parseEventPayload(payload, env);
}
