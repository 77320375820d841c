import { describe, it, expect } from 'vitest';
import {
  formatTimestamp,
  formatEventMessage,
  parseIsoTimestamp,
} from '../../src/application/format-event.js';

describe('formatTimestamp', () => {
  it.each([
    ['2024-03-07T14:30:00', '07 March 2024 - 02:30 PM UTC'],
    ['2024-03-07T14:30:00Z', '07 March 2024 - 02:30 PM UTC'],
    ['2024-03-07T14:30:00.123456', '07 March 2024 - 02:30 PM UTC'],
    ['2024-03-07T14:30:59.999Z', '07 March 2024 - 02:30 PM UTC'],
    ['2024-03-07 09:05', '07 March 2024 - 09:05 AM UTC'],
    ['2024-01-05T00:05:00+00:00', '05 January 2024 - 12:05 AM UTC'],
    ['2024-12-31T12:00:00Z', '31 December 2024 - 12:00 PM UTC'],
    ['2024-03-07', '07 March 2024 - 12:00 AM UTC'],
  ])('renders %s as %s', (raw, expected) => {
    expect(formatTimestamp(raw)).toBe(expected);
  });

  it('keeps the wall-clock time of an explicit offset', () => {
    expect(formatTimestamp('2024-03-07T16:30:00+02:00')).toBe('07 March 2024 - 04:30 PM UTC');
    expect(formatTimestamp('2024-03-01T01:00:00+02:00')).toBe('01 March 2024 - 01:00 AM UTC');
    expect(formatTimestamp('2024-03-07T09:00:00-05:30')).toBe('07 March 2024 - 09:00 AM UTC');
  });

  it('keeps years below 100 literal and pads them to four digits', () => {
    expect(formatTimestamp('0024-03-07T14:30:00')).toBe('07 March 0024 - 02:30 PM UTC');
    expect(formatTimestamp('0001-01-01T00:00:00Z')).toBe('01 January 0001 - 12:00 AM UTC');
  });

  it.each([
    'not-a-date',
    '',
    '2024-02-30T10:00:00',
    '2023-02-29T10:00:00',
    '2024-13-01T10:00:00',
    '2024-03-07T24:00:00',
    '2024-03-07T14:30:00+25:00',
    '0000-03-07T14:30:00',
    '07/03/2024 14:30',
  ])('returns unparseable input %j unchanged', (raw) => {
    expect(formatTimestamp(raw)).toBe(raw);
  });
});

describe('parseIsoTimestamp', () => {
  it('returns epoch milliseconds for a UTC timestamp', () => {
    expect(parseIsoTimestamp('2024-03-07T14:30:00Z')).toBe(Date.UTC(2024, 2, 7, 14, 30, 0));
  });

  it('ignores the offset when computing the instant', () => {
    expect(parseIsoTimestamp('2024-03-07T14:30:00+02:00')).toBe(Date.UTC(2024, 2, 7, 14, 30, 0));
  });

  it('returns null for an impossible date', () => {
    expect(parseIsoTimestamp('2024-04-31T00:00:00')).toBeNull();
  });

  it('returns null for year 0', () => {
    expect(parseIsoTimestamp('0000-01-01T00:00:00')).toBeNull();
  });
});

describe('formatEventMessage', () => {
  const timestamp = '2024-03-07T14:30:00';

  it('renders a push', () => {
    expect(formatEventMessage({ author: 'alice', action: 'PUSH', to_branch: 'main', timestamp }))
      .toBe('"alice" pushed to "main" on 07 March 2024 - 02:30 PM UTC');
  });

  it('renders a pull request', () => {
    expect(formatEventMessage({
      author: 'bob', action: 'PULL_REQUEST', from_branch: 'feat', to_branch: 'main', timestamp,
    })).toBe('"bob" submitted a pull request from "feat" to "main" on 07 March 2024 - 02:30 PM UTC');
  });

  it('renders a merge', () => {
    expect(formatEventMessage({
      author: 'carol', action: 'MERGE', from_branch: 'feat', to_branch: 'main', timestamp,
    })).toBe('"carol" merged branch "feat" to "main" on 07 March 2024 - 02:30 PM UTC');
  });

  it('renders any other action generically', () => {
    expect(formatEventMessage({ author: 'dave', action: 'FORK', to_branch: 'main', timestamp }))
      .toBe('"dave" performed FORK on 07 March 2024 - 02:30 PM UTC');
  });

  it('falls back to defaults for missing fields and a raw timestamp', () => {
    expect(formatEventMessage({ action: 'MERGE', from_branch: null, timestamp: 'yesterday' }))
      .toBe('"Unknown" merged branch "" to "" on yesterday');
  });
});
