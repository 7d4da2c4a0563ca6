/**
 * resolveTrack.ts
 *
 * Track Resolution Engine
 *
 * resolveSong: two-pass fuzzy search
 * 1. "<title> <artistHint>" (12 candidates)
 * 2. only if pass 1 returned nothing: "<title>" alone (8 candidates)
 * Each candidate scores the mean of title and primary-performer similarity.
 * There is no minimum score here; callers apply their own floor.
 *
 * fallbackTopTracks: most popular catalog tracks for a performer without a
 * recorded setlist.
 */

import { similarity } from "../match/similarity";
import type { CandidateTrack, CatalogSearchClient, TrackMatch } from "../types";
import { TtlCache, cacheKey } from "./cache";

const FULL_QUERY_LIMIT = 12;
const TITLE_QUERY_LIMIT = 8;
const TOP_TRACKS_LIMIT = 40;

export function scoreCandidate(
  title: string,
  artistHint: string,
  candidate: CandidateTrack,
): number {
  const titleScore = similarity(title, candidate.title);
  const artistScore = similarity(artistHint, candidate.performerNames[0] ?? "");
  return (titleScore + artistScore) / 2;
}

function bestCandidate(
  title: string,
  artistHint: string,
  candidates: CandidateTrack[],
): TrackMatch | null {
  let best: TrackMatch | null = null;
  for (const candidate of candidates) {
    const confidence = scoreCandidate(title, artistHint, candidate);
    if (!best || confidence > best.confidence) {
      best = { trackId: candidate.id, confidence };
    }
  }
  return best;
}

export async function resolveSong(
  catalog: CatalogSearchClient,
  title: string,
  artistHint: string,
): Promise<TrackMatch | null> {
  let candidates = await catalog.searchTracks(
    `${title} ${artistHint}`.trim(),
    FULL_QUERY_LIMIT,
  );
  if (candidates.length === 0) {
    candidates = await catalog.searchTracks(title, TITLE_QUERY_LIMIT);
  }

  const match = bestCandidate(title, artistHint, candidates);
  if (!match) {
    console.warn(`[tracks] No catalog results for "${title}" by ${artistHint}`);
  }
  return match;
}

export async function fallbackTopTracks(
  catalog: CatalogSearchClient,
  performerName: string,
  limit: number,
): Promise<string[]> {
  if (limit <= 0) return [];

  let candidates = await catalog.searchTracks(
    `artist:${performerName}`,
    TOP_TRACKS_LIMIT,
  );
  if (candidates.length === 0) {
    candidates = await catalog.searchTracks(performerName, TOP_TRACKS_LIMIT);
  }

  // Array.prototype.sort is stable, equal popularity keeps catalog order
  return [...candidates]
    .sort((a, b) => b.popularity - a.popularity)
    .slice(0, limit)
    .map((t) => t.id);
}

export interface TrackResolver {
  resolveSong(title: string, artistHint: string): Promise<TrackMatch | null>;
  fallbackTopTracks(performerName: string, limit: number): Promise<string[]>;
  clearCache(): void;
}

/**
 * Bind the engine to a catalog, memoizing both operations per run.
 */
export function createTrackResolver(
  catalog: CatalogSearchClient,
  ttlMs?: number,
): TrackResolver {
  const songs = new TtlCache<TrackMatch | null>(ttlMs);
  const tops = new TtlCache<string[]>(ttlMs);

  return {
    resolveSong: (title, artistHint) =>
      songs.getOrLoad(cacheKey("song", title, artistHint), () =>
        resolveSong(catalog, title, artistHint),
      ),
    fallbackTopTracks: async (performerName, limit) => {
      const ids = await tops.getOrLoad(cacheKey("top", performerName, limit), () =>
        fallbackTopTracks(catalog, performerName, limit),
      );
      return [...ids];
    },
    clearCache: () => {
      songs.clear();
      tops.clear();
    },
  };
}
