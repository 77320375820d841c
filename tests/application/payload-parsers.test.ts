import { describe, it, expect } from 'vitest';
import {
  parsePushEvent,
  parsePullRequestOpened,
  parseMergeEvent,
} from '../../src/application/payload-parsers.js';

const PR_PAYLOAD = {
  action: 'opened',
  pull_request: {
    id: 7,
    user: { login: 'bob' },
    base: { ref: 'main' },
    head: { ref: 'feat' },
  },
};

// ─── push ────────────────────────────────────────────────────

describe('parsePushEvent', () => {
  it('uses the last commit as the representative commit', () => {
    const outcome = parsePushEvent({
      ref: 'refs/heads/main',
      pusher: { name: 'alice' },
      commits: [{ id: 'a' }, { id: 'b' }],
    });

    expect(outcome.status).toBe('parsed');
    if (outcome.status !== 'parsed') return;
    expect(outcome.event).toMatchObject({
      request_id: 'b',
      author: 'alice',
      action: 'PUSH',
      to_branch: 'main',
      from_branch: null,
    });
  });

  it('yields not_applicable for an empty commit list', () => {
    expect(parsePushEvent({ ref: 'refs/heads/main', commits: [] })).toEqual({
      status: 'not_applicable',
      reason: 'push contained no commits',
    });
  });

  it('yields not_applicable when commits are missing', () => {
    expect(parsePushEvent({ ref: 'refs/heads/main', pusher: { name: 'alice' } }).status)
      .toBe('not_applicable');
  });

  it('defaults author to Unknown when pusher is absent', () => {
    const outcome = parsePushEvent({ ref: 'refs/heads/dev', commits: [{ id: 'c1' }] });
    expect(outcome.status === 'parsed' && outcome.event.author).toBe('Unknown');
  });

  it('only strips a leading refs/heads/ prefix', () => {
    const tag = parsePushEvent({ ref: 'refs/tags/v1.0', commits: [{ id: 'c1' }] });
    expect(tag.status === 'parsed' && tag.event.to_branch).toBe('refs/tags/v1.0');

    const nested = parsePushEvent({ ref: 'refs/heads/feature/refs/heads/x', commits: [{ id: 'c1' }] });
    expect(nested.status === 'parsed' && nested.event.to_branch).toBe('feature/refs/heads/x');
  });

  it('defaults request_id and to_branch to empty strings', () => {
    const outcome = parsePushEvent({ commits: [{ message: 'no id' }] });
    expect(outcome.status).toBe('parsed');
    if (outcome.status !== 'parsed') return;
    expect(outcome.event.request_id).toBe('');
    expect(outcome.event.to_branch).toBe('');
  });

  it('yields not_applicable with issues for a malformed payload', () => {
    const outcome = parsePushEvent({ commits: 'not-a-list' });
    expect(outcome.status).toBe('not_applicable');
    if (outcome.status !== 'not_applicable') return;
    expect(outcome.reason).toBe('malformed push payload');
    expect(outcome.issues).toHaveLength(1);
  });

  it('yields not_applicable for a non-object payload', () => {
    expect(parsePushEvent('push').status).toBe('not_applicable');
  });
});

// ─── pull request opened ─────────────────────────────────────

describe('parsePullRequestOpened', () => {
  it('maps the pull request fields', () => {
    const outcome = parsePullRequestOpened(PR_PAYLOAD);

    expect(outcome.status).toBe('parsed');
    if (outcome.status !== 'parsed') return;
    expect(outcome.event).toMatchObject({
      request_id: '7',
      author: 'bob',
      action: 'PULL_REQUEST',
      to_branch: 'main',
      from_branch: 'feat',
    });
  });

  it('keeps a string id as-is', () => {
    const outcome = parsePullRequestOpened({ pull_request: { ...PR_PAYLOAD.pull_request, id: 'PR_kw1' } });
    expect(outcome.status === 'parsed' && outcome.event.request_id).toBe('PR_kw1');
  });

  it('applies defaults when pull_request is missing', () => {
    const outcome = parsePullRequestOpened({ action: 'opened' });

    expect(outcome.status).toBe('parsed');
    if (outcome.status !== 'parsed') return;
    expect(outcome.event).toMatchObject({
      request_id: '',
      author: 'Unknown',
      to_branch: '',
      from_branch: '',
    });
  });

  it('yields not_applicable when a field has the wrong type', () => {
    const outcome = parsePullRequestOpened({ pull_request: { id: 7, base: { ref: 12 } } });
    expect(outcome.status).toBe('not_applicable');
    if (outcome.status !== 'not_applicable') return;
    expect(outcome.reason).toBe('malformed pull_request payload');
  });
});

// ─── merge ───────────────────────────────────────────────────

describe('parseMergeEvent', () => {
  it('maps a merged pull request to MERGE by merged_by', () => {
    const outcome = parseMergeEvent({
      action: 'closed',
      pull_request: { ...PR_PAYLOAD.pull_request, merged: true, merged_by: { login: 'carol' } },
    });

    expect(outcome.status).toBe('parsed');
    if (outcome.status !== 'parsed') return;
    expect(outcome.event).toMatchObject({
      request_id: '7',
      author: 'carol',
      action: 'MERGE',
      to_branch: 'main',
      from_branch: 'feat',
    });
  });

  it('yields not_applicable for a pull request closed without merge', () => {
    expect(parseMergeEvent({
      action: 'closed',
      pull_request: { ...PR_PAYLOAD.pull_request, merged: false },
    })).toEqual({ status: 'not_applicable', reason: 'pull request closed without merge' });
  });

  it('defaults author to Unknown when merged_by is null', () => {
    const outcome = parseMergeEvent({
      pull_request: { ...PR_PAYLOAD.pull_request, merged: true, merged_by: null },
    });
    expect(outcome.status === 'parsed' && outcome.event.author).toBe('Unknown');
  });
});
