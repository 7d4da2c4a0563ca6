/**
 * processEvents.ts
 *
 * Batch runner: resolve each event, assemble its playlist, keep going when
 * one event fails. Events are processed one at a time.
 */

import { errorMessage } from "../errors";
import { resolveEvent, type EventResolverDeps } from "../events/resolveEvent";
import { assemblePlaylist, type AssemblerDeps } from "../playlist/assemble";
import type { EventQuery } from "../types";

export interface PipelineDeps {
  resolver: EventResolverDeps;
  assembler: AssemblerDeps;
}

export interface EventResult {
  query: EventQuery;
  status: "created" | "exists" | "skipped" | "failed";
  playlistId?: string;
  playlistName?: string;
  reason?: string;
}

export interface RunSummary {
  total: number;
  created: number;
  exists: number;
  skipped: number;
  failed: number;
  festivals: number;
  songsTotal: number;
  songsMatched: number;
  fallbackTracks: number;
  matchRate: number; // percent, one decimal
  skippedReasons: string[];
  failedSongs: string[];
}

function emptySummary(total: number): RunSummary {
  return {
    total,
    created: 0,
    exists: 0,
    skipped: 0,
    failed: 0,
    festivals: 0,
    songsTotal: 0,
    songsMatched: 0,
    fallbackTracks: 0,
    matchRate: 0,
    skippedReasons: [],
    failedSongs: [],
  };
}

async function processEvent(
  query: EventQuery,
  deps: PipelineDeps,
  summary: RunSummary,
): Promise<EventResult> {
  const event = await resolveEvent(query, deps.resolver);
  if (!event) {
    return {
      query,
      status: "skipped",
      reason: `${query.artist} on ${query.date}: No setlist data found`,
    };
  }
  if (event.isFestival) summary.festivals++;

  const outcome = await assemblePlaylist(event, query, deps.assembler);
  summary.songsTotal += outcome.stats.songsTotal;
  summary.songsMatched += outcome.stats.songsMatched;
  summary.fallbackTracks += outcome.stats.fallbackTracks;
  summary.failedSongs.push(
    ...outcome.stats.unmatchedSongs.map(
      (song) => `${song} (${query.artist} - ${query.date})`,
    ),
  );

  if (outcome.status === "skipped") {
    return { query, status: "skipped", reason: outcome.reason };
  }
  return {
    query,
    status: outcome.status,
    playlistId: outcome.playlistId,
    playlistName: outcome.plan.name,
  };
}

export async function processEvents(
  events: EventQuery[],
  deps: PipelineDeps,
): Promise<{ results: EventResult[]; summary: RunSummary }> {
  const summary = emptySummary(events.length);
  const results: EventResult[] = [];

  for (const [index, query] of events.entries()) {
    console.log(
      `[pipeline] Event ${index + 1}/${events.length}: ${query.artist} on ${query.date}` +
        (query.venue || query.city
          ? ` at ${[query.venue, query.city].filter(Boolean).join(", ")}`
          : ""),
    );

    let result: EventResult;
    try {
      result = await processEvent(query, deps, summary);
    } catch (error) {
      const reason = `${query.artist} on ${query.date}: ${errorMessage(error)}`;
      console.error(`[pipeline] Event failed: ${reason}`);
      result = { query, status: "failed", reason };
    }

    summary[result.status]++;
    if (result.status === "skipped" && result.reason) {
      summary.skippedReasons.push(result.reason);
    }
    results.push(result);
  }

  summary.matchRate =
    summary.songsTotal > 0
      ? Math.round((summary.songsMatched / summary.songsTotal) * 1000) / 10
      : 0;

  return { results, summary };
}

export function printSummary(summary: RunSummary): void {
  console.log("[pipeline] ========== Summary ==========");
  console.log(`[pipeline] Events: ${summary.total} (${summary.festivals} festivals)`);
  console.log(
    `[pipeline] Playlists created: ${summary.created}, already existing: ${summary.exists}, skipped: ${summary.skipped}, failed: ${summary.failed}`,
  );
  console.log(
    `[pipeline] Songs matched: ${summary.songsMatched}/${summary.songsTotal} (${summary.matchRate}%), fallback tracks: ${summary.fallbackTracks}`,
  );
  for (const reason of summary.skippedReasons) {
    console.log(`[pipeline]   skipped: ${reason}`);
  }
  for (const song of summary.failedSongs) {
    console.log(`[pipeline]   unmatched: ${song}`);
  }
}
