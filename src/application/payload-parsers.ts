import type { Event } from '../domain/index.js';
import { createEvent } from '../domain/index.js';
import { pushPayloadSchema, pullRequestPayloadSchema } from './webhook-schema.js';
import type { PullRequestPayload } from './webhook-schema.js';

const UNKNOWN_AUTHOR = 'Unknown';
const BRANCH_REF_PREFIX = 'refs/heads/';

/**
 * Result of mapping one webhook payload onto the Event model.
 * `not_applicable` covers both intentionally skipped payloads and
 * payloads whose shape does not match the expected schema.
 */
export type ParseOutcome =
  | { status: 'parsed'; event: Event }
  | { status: 'not_applicable'; reason: string; issues?: string[] };

/** Signature shared by every payload parser. */
export type PayloadParser = (payload: unknown) => ParseOutcome;

function notApplicable(reason: string, issues?: string[]): ParseOutcome {
  return issues === undefined
    ? { status: 'not_applicable', reason }
    : { status: 'not_applicable', reason, issues };
}

function stripBranchPrefix(ref: string): string {
  return ref.startsWith(BRANCH_REF_PREFIX) ? ref.slice(BRANCH_REF_PREFIX.length) : ref;
}

/**
 * Push: the last commit in the push is representative.
 * A push without commits (e.g. a branch deletion) yields no event.
 */
export function parsePushEvent(payload: unknown): ParseOutcome {
  const parsed = pushPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return notApplicable('malformed push payload', parsed.error.issues.map((i) => i.message));
  }

  const commits = parsed.data.commits ?? [];
  const latest = commits.at(-1);
  if (latest === undefined) {
    return notApplicable('push contained no commits');
  }

  return {
    status: 'parsed',
    event: createEvent({
      request_id: latest.id ?? '',
      author: parsed.data.pusher?.name ?? UNKNOWN_AUTHOR,
      action: 'PUSH',
      to_branch: stripBranchPrefix(parsed.data.ref ?? ''),
      from_branch: null,
    }),
  };
}

type PullRequest = NonNullable<PullRequestPayload['pull_request']>;

type PullRequestRead =
  | { ok: true; pr: PullRequest }
  | { ok: false; outcome: ParseOutcome };

function readPullRequest(payload: unknown): PullRequestRead {
  const parsed = pullRequestPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return {
      ok: false,
      outcome: notApplicable('malformed pull_request payload', parsed.error.issues.map((i) => i.message)),
    };
  }
  return { ok: true, pr: parsed.data.pull_request ?? {} };
}

function pullRequestId(pr: PullRequest): string {
  return pr.id === undefined || pr.id === null ? '' : String(pr.id);
}

/** Pull request opened: the PR author submits `head` into `base`. */
export function parsePullRequestOpened(payload: unknown): ParseOutcome {
  const read = readPullRequest(payload);
  if (!read.ok) return read.outcome;
  const { pr } = read;

  return {
    status: 'parsed',
    event: createEvent({
      request_id: pullRequestId(pr),
      author: pr.user?.login ?? UNKNOWN_AUTHOR,
      action: 'PULL_REQUEST',
      to_branch: pr.base?.ref ?? '',
      from_branch: pr.head?.ref ?? '',
    }),
  };
}

/**
 * Pull request closed with `merged: true`. A PR closed without merging
 * yields no event, so a mis-routed close is never recorded as a merge.
 */
export function parseMergeEvent(payload: unknown): ParseOutcome {
  const read = readPullRequest(payload);
  if (!read.ok) return read.outcome;
  const { pr } = read;

  if (pr.merged !== true) {
    return notApplicable('pull request closed without merge');
  }

  return {
    status: 'parsed',
    event: createEvent({
      request_id: pullRequestId(pr),
      author: pr.merged_by?.login ?? UNKNOWN_AUTHOR,
      action: 'MERGE',
      to_branch: pr.base?.ref ?? '',
      from_branch: pr.head?.ref ?? '',
    }),
  };
}
