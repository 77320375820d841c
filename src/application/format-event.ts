import type { EventDocument } from '../domain/index.js';

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

/**
 * `YYYY-MM-DD[(T| )HH:MM[:SS[.fraction]][Z|±HH:MM]]`.
 * The offset is validated but the wall-clock time is rendered as given.
 */
const ISO_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})?)?$/;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

function isValidOffset(offset: string | undefined): boolean {
  if (offset === undefined || offset === 'Z') return true;
  return Number(offset.slice(1, 3)) <= 23 && Number(offset.slice(4, 6)) <= 59;
}

/** `Date.UTC` maps years 0-99 onto 1900-1999; `setUTCFullYear` does not. */
function utcMillis(year: number, monthIndex: number, day: number, hour = 0, minute = 0, second = 0): number {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  date.setUTCHours(hour, minute, second, 0);
  return date.getTime();
}

/**
 * Parses an ISO-8601 string into the epoch milliseconds of its wall-clock
 * time read as UTC. Returns null for anything that is not a real calendar
 * date, year 0 included.
 */
export function parseIsoTimestamp(raw: string): number | null {
  const m = ISO_RE.exec(raw);
  if (m === null) return null;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const hour = Number(m[4] ?? '0');
  const minute = Number(m[5] ?? '0');
  const second = Number(m[6] ?? '0');

  if (!isValidOffset(m[7])) return null;
  if (year < 1 || month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;

  const midnight = new Date(utcMillis(year, month - 1, day));
  if (midnight.getUTCDate() !== day || midnight.getUTCMonth() !== month - 1) return null;

  return utcMillis(year, month - 1, day, hour, minute, second);
}

/**
 * Renders a stored timestamp as `07 March 2024 - 02:30 PM UTC`.
 * Falls back to the raw string when it cannot be parsed.
 */
export function formatTimestamp(raw: string): string {
  const ms = parseIsoTimestamp(raw);
  if (ms === null) return raw;

  const date = new Date(ms);
  const hours = date.getUTCHours();
  const hours12 = hours % 12 === 0 ? 12 : hours % 12;
  const month = MONTHS[date.getUTCMonth()] ?? '';
  const year = String(date.getUTCFullYear()).padStart(4, '0');

  return `${pad(date.getUTCDate())} ${month} ${year} - `
    + `${pad(hours12)}:${pad(date.getUTCMinutes())} ${hours < 12 ? 'AM' : 'PM'} UTC`;
}

/** Stored fields the message renderer reads; any may be missing on foreign rows. */
export type MessageFields = Partial<Pick<EventDocument, 'author' | 'action' | 'from_branch' | 'to_branch' | 'timestamp'>>;

export function formatEventMessage(event: MessageFields): string {
  const author = event.author ?? 'Unknown';
  const action = event.action ?? '';
  const to = event.to_branch ?? '';
  const from = event.from_branch ?? '';
  const when = formatTimestamp(event.timestamp ?? '');

  switch (action) {
    case 'PUSH':
      return `"${author}" pushed to "${to}" on ${when}`;
    case 'PULL_REQUEST':
      return `"${author}" submitted a pull request from "${from}" to "${to}" on ${when}`;
    case 'MERGE':
      return `"${author}" merged branch "${from}" to "${to}" on ${when}`;
    default:
      return `"${author}" performed ${action} on ${when}`;
  }
}
