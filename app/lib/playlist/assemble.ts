/**
 * assemble.ts
 *
 * Playlist Assembler
 *
 * Normal:   openers (already in playback order), then the headliner
 * Festival: lineup order
 * Skip:     no track resolved; logged, never a run-level error
 *
 * Performers without a setlist contribute their most popular tracks; those
 * ids are final and never searched again.
 */

import { MATCH_POLICY } from "../config";
import { errorMessage } from "../errors";
import type { TrackResolver } from "../tracks/resolveTrack";
import type {
  EventQuery,
  LineupEntry,
  PlaylistPair,
  PlaylistPlan,
  PlaylistSink,
  ResolvedEvent,
} from "../types";
import { playlistDescription, playlistName } from "./describe";

export interface AssemblerDeps {
  resolver: TrackResolver;
  sink: PlaylistSink;
  fallbackTrackCount: number;
  usableConfidence?: number;
}

export interface AssemblyStats {
  songsTotal: number;
  songsMatched: number;
  unmatchedSongs: string[]; // "title by performer"
  fallbackTracks: number;
}

export type AssemblyOutcome =
  | { status: "created"; playlistId: string; plan: PlaylistPlan; stats: AssemblyStats }
  | { status: "exists"; playlistId: string; plan: PlaylistPlan; stats: AssemblyStats }
  | { status: "skipped"; reason: string; stats: AssemblyStats };

/**
 * Performers in the order their tracks go into the playlist.
 */
export function playbackOrder(event: ResolvedEvent): LineupEntry[] {
  return event.isFestival ? event.lineup : [...event.openers, event.headliner];
}

export async function buildPlaylistPairs(
  event: ResolvedEvent,
  resolver: TrackResolver,
  fallbackTrackCount: number,
): Promise<PlaylistPair[]> {
  const pairs: PlaylistPair[] = [];

  for (const performer of playbackOrder(event)) {
    if (performer.songs.length > 0) {
      for (const title of performer.songs) {
        pairs.push({ kind: "song", title, artistHint: performer.name });
      }
      continue;
    }

    const ids = await resolver.fallbackTopTracks(performer.name, fallbackTrackCount);
    console.log(
      `[assembler] No setlist for ${performer.name}, using ${ids.length} popular tracks`,
    );
    for (const trackId of ids) {
      pairs.push({ kind: "resolved", trackId, performer: performer.name });
    }
  }

  return pairs;
}

/**
 * Turn pairs into an ordered, duplicate-free id list. The first occurrence of
 * an id keeps its position.
 */
export async function resolvePairs(
  pairs: PlaylistPair[],
  resolver: TrackResolver,
  usableConfidence: number = MATCH_POLICY.usableConfidence,
): Promise<{ trackIds: string[]; stats: AssemblyStats }> {
  const seen = new Set<string>();
  const trackIds: string[] = [];
  const stats: AssemblyStats = {
    songsTotal: 0,
    songsMatched: 0,
    unmatchedSongs: [],
    fallbackTracks: 0,
  };

  const keep = (id: string) => {
    if (seen.has(id)) return;
    seen.add(id);
    trackIds.push(id);
  };

  for (const pair of pairs) {
    if (pair.kind === "resolved") {
      stats.fallbackTracks++;
      keep(pair.trackId);
      continue;
    }

    stats.songsTotal++;
    const match = await resolver.resolveSong(pair.title, pair.artistHint);
    if (!match || match.confidence < usableConfidence) {
      stats.unmatchedSongs.push(`${pair.title} by ${pair.artistHint}`);
      if (match) {
        console.warn(
          `[assembler] Dropping "${pair.title}" by ${pair.artistHint} (confidence ${match.confidence})`,
        );
      }
      continue;
    }

    stats.songsMatched++;
    keep(match.trackId);
  }

  return { trackIds, stats };
}

async function findExisting(sink: PlaylistSink, name: string): Promise<string | null> {
  try {
    return await sink.findPlaylistByName(name);
  } catch (error) {
    console.warn(
      `[assembler] Could not check for existing playlist "${name}": ${errorMessage(error)}`,
    );
    return null;
  }
}

export async function assemblePlaylist(
  event: ResolvedEvent,
  query: EventQuery,
  deps: AssemblerDeps,
): Promise<AssemblyOutcome> {
  const pairs = await buildPlaylistPairs(
    event,
    deps.resolver,
    deps.fallbackTrackCount,
  );
  const { trackIds, stats } = await resolvePairs(
    pairs,
    deps.resolver,
    deps.usableConfidence,
  );

  console.log(
    `[assembler] Matched ${stats.songsMatched}/${stats.songsTotal} songs, ${stats.fallbackTracks} fallback tracks`,
  );

  if (trackIds.length === 0) {
    const reason = `${query.artist} on ${query.date}: No tracks matched`;
    console.warn(`[assembler] ${reason}`);
    return { status: "skipped", reason, stats };
  }

  const plan: PlaylistPlan = {
    name: playlistName(event, query),
    description: playlistDescription(event, query),
    trackIds,
  };

  const existingId = await findExisting(deps.sink, plan.name);
  if (existingId) {
    console.log(`[assembler] Playlist "${plan.name}" already exists (${existingId})`);
    return { status: "exists", playlistId: existingId, plan, stats };
  }

  const ownerId = await deps.sink.getOwnerId();
  const playlistId = await deps.sink.createPlaylist(ownerId, plan.name, plan.description);
  await deps.sink.addTracks(playlistId, plan.trackIds);

  console.log(
    `[assembler] Created "${plan.name}" with ${plan.trackIds.length} tracks (${playlistId})`,
  );
  return { status: "created", playlistId, plan, stats };
}
