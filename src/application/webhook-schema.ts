import { z } from 'zod';

/**
 * Zod schemas for the parts of GitHub webhook bodies the parsers read.
 *
 * Every field is optional and `null` is accepted wherever GitHub may send
 * it; defaults are applied by the parsers, not here. Unknown keys pass
 * through untouched.
 */

const refSchema = z.object({ ref: z.string().nullish() }).passthrough();

const accountSchema = z.object({ login: z.string().nullish() }).passthrough();

export const pushPayloadSchema = z.object({
  ref: z.string().nullish(),
  pusher: z.object({ name: z.string().nullish() }).passthrough().nullish(),
  commits: z.array(
    z.object({ id: z.string().nullish() }).passthrough(),
  ).nullish(),
}).passthrough();

export type PushPayload = z.infer<typeof pushPayloadSchema>;

export const pullRequestPayloadSchema = z.object({
  action: z.string().nullish(),
  pull_request: z.object({
    id: z.union([z.number(), z.string()]).nullish(),
    merged: z.boolean().nullish(),
    user: accountSchema.nullish(),
    merged_by: accountSchema.nullish(),
    base: refSchema.nullish(),
    head: refSchema.nullish(),
  }).passthrough().nullish(),
}).passthrough();

export type PullRequestPayload = z.infer<typeof pullRequestPayloadSchema>;

/**
 * Body of POST /api/webhook/test. Missing fields fall back to the
 * documented test defaults; `action` is validated by the Event model.
 */
export const testEventSchema = z.object({
  request_id: z.string().optional(),
  author: z.string().optional(),
  action: z.string().optional(),
  to_branch: z.string().optional(),
  from_branch: z.string().nullish(),
}).passthrough();

export type TestEventInput = z.infer<typeof testEventSchema>;
