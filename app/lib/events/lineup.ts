/**
 * lineup.ts
 *
 * Turns raw candidate records into lineup entries and orders them.
 * Pure functions, no I/O.
 */

import { isValid, parseISO } from "date-fns";
import type { CandidateRecord, LineupEntry, StartTime } from "../types";

/**
 * Performer identity used for grouping: case and surrounding whitespace are
 * ignored, everything else is significant.
 */
export function performerKey(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Counts named performers only, matching what buildLineup keeps.
 */
export function distinctPerformerCount(records: CandidateRecord[]): number {
  return new Set(
    records.map((r) => performerKey(r.performerName)).filter(Boolean),
  ).size;
}

/**
 * Parse "HH:MM" or "HH:MM:SS" into a sortable tuple.
 */
export function parseStartTime(value: string | null | undefined): StartTime | null {
  if (!value) return null;
  const match = value.trim().match(/^(\d{1,2}):(\d{2})(?::(\d{2}))?$/);
  if (!match) return null;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] ? Number(match[3]) : 0;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  return [hours, minutes, seconds];
}

function timestamp(value: string | null): number | null {
  if (!value) return null;
  const parsed = parseISO(value);
  return isValid(parsed) ? parsed.getTime() : null;
}

function laterOf(a: string | null, b: string | undefined): string | null {
  if (!b) return a;
  if (!a) return b;
  const ta = timestamp(a);
  const tb = timestamp(b);
  if (tb === null) return a;
  if (ta === null) return b;
  return tb > ta ? b : a;
}

/**
 * Merge records into one entry per performer, in first-seen order.
 *
 * - songs: concatenated in record order, exact duplicate titles dropped
 * - startTime: first parseable value
 * - lastUpdated: most recent value
 */
export function buildLineup(records: CandidateRecord[]): LineupEntry[] {
  const entries = new Map<string, LineupEntry>();
  const seenSongs = new Map<string, Set<string>>();

  for (const record of records) {
    const name = record.performerName.trim();
    if (!name) continue;
    const key = performerKey(name);

    let entry = entries.get(key);
    let songs = seenSongs.get(key);
    if (!entry || !songs) {
      entry = { name, songs: [], startTime: null, lastUpdated: null };
      songs = new Set<string>();
      entries.set(key, entry);
      seenSongs.set(key, songs);
    }

    for (const title of record.songs) {
      if (songs.has(title)) continue;
      songs.add(title);
      entry.songs.push(title);
    }

    if (!entry.startTime) entry.startTime = parseStartTime(record.startTime);
    entry.lastUpdated = laterOf(entry.lastUpdated, record.lastUpdated);
  }

  return Array.from(entries.values());
}

function compareStartTimes(a: StartTime, b: StartTime): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return 0;
}

/**
 * Playback order: start time ascending (missing last), then lastUpdated
 * ascending (missing last), then lower-cased name.
 */
export function compareLineupEntries(a: LineupEntry, b: LineupEntry): number {
  if (a.startTime && b.startTime) {
    const diff = compareStartTimes(a.startTime, b.startTime);
    if (diff !== 0) return diff;
  } else if (a.startTime) {
    return -1;
  } else if (b.startTime) {
    return 1;
  }

  const ta = timestamp(a.lastUpdated);
  const tb = timestamp(b.lastUpdated);
  if (ta !== null && tb !== null) {
    if (ta !== tb) return ta - tb;
  } else if (ta !== null) {
    return -1;
  } else if (tb !== null) {
    return 1;
  }

  const na = a.name.toLowerCase();
  const nb = b.name.toLowerCase();
  if (na < nb) return -1;
  if (na > nb) return 1;
  return 0;
}

export function sortLineup(entries: LineupEntry[]): LineupEntry[] {
  return [...entries].sort(compareLineupEntries);
}
