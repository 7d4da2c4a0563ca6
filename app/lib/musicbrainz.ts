// lib/musicbrainz.ts
import { MusicBrainzApi } from "musicbrainz-api";
import { MATCH_POLICY } from "./config";
import { similarity } from "./match/similarity";
import type { ArtistDirectory } from "./types";

let cachedClient: MusicBrainzApi | null = null;

export function getMBClient(): MusicBrainzApi {
  if (cachedClient) return cachedClient;

  cachedClient = new MusicBrainzApi({
    appName: "setlist-playlists",
    appVersion: "0.1.0",
    appContactInfo: "setlist-playlists@example.com",
  });

  return cachedClient;
}

export interface ArtistCandidate {
  id: string;
  name: string;
  score: number | null;
}

/**
 * Search MusicBrainz artists by name. Failures come back as an empty list;
 * the lookup is only ever a second chance for setlist.fm.
 */
export async function searchArtists(
  name: string,
  limit = 5,
): Promise<ArtistCandidate[]> {
  try {
    const result = await getMBClient().search("artist", {
      query: `artist:"${name.replace(/"/g, "")}"`,
      limit,
    });
    return (result.artists ?? []).map((artist) => ({
      id: artist.id,
      name: artist.name,
      score: typeof artist.score === "number" ? artist.score : null,
    }));
  } catch (error) {
    console.error("[musicbrainz] Artist search failed", error);
    return [];
  }
}

/**
 * Pick the candidate whose name is closest to the query. Ties go to the
 * higher MusicBrainz search score, then to the earlier result.
 */
export function pickArtist(
  name: string,
  candidates: ArtistCandidate[],
  threshold: number = MATCH_POLICY.artistMatchThreshold,
): ArtistCandidate | null {
  let best: ArtistCandidate | null = null;
  let bestScore = -1;

  for (const candidate of candidates) {
    const score = similarity(name, candidate.name);
    const better =
      score > bestScore ||
      (score === bestScore &&
        best !== null &&
        (candidate.score ?? 0) > (best.score ?? 0));
    if (better) {
      best = candidate;
      bestScore = score;
    }
  }

  return best && bestScore >= threshold ? best : null;
}

const cache = new Map<string, Promise<string | null>>();

export function clearArtistCache(): void {
  cache.clear();
}

/**
 * ArtistDirectory backed by MusicBrainz. Lookups are memoized per name for
 * the life of the process.
 */
export const musicBrainzDirectory: ArtistDirectory = {
  findArtistId(name: string): Promise<string | null> {
    const key = name.toLowerCase().trim();
    const existing = cache.get(key);
    if (existing) return existing;

    const task = searchArtists(name).then((candidates) => {
      const picked = pickArtist(name, candidates);
      if (picked) {
        console.log(`[musicbrainz] ${name} -> ${picked.name} (${picked.id})`);
      }
      return picked?.id ?? null;
    });

    cache.set(key, task);
    return task;
  },
};
