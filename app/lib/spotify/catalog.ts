/**
 * catalog.ts
 *
 * Catalog Search Client on Spotify's track search.
 */

import { requestJson, type RequestPolicy } from "../http/request";
import type { Clock, RateLimiter } from "../http/rateLimiter";
import type {
  CandidateTrack,
  CatalogSearchClient,
  TokenProvider,
} from "../types";

export const SPOTIFY_API_BASE = "https://api.spotify.com/v1";
const MAX_SEARCH_LIMIT = 50;

export interface SpotifyArtist {
  id?: string;
  name?: string;
}

export interface SpotifyTrack {
  id?: string;
  name?: string;
  uri?: string;
  popularity?: number;
  artists?: SpotifyArtist[];
}

export interface SpotifySearchResponse {
  tracks?: {
    items?: SpotifyTrack[];
    total?: number;
  };
}

export interface SpotifyClientOptions {
  tokens: TokenProvider;
  limiter: RateLimiter;
  timeoutMs?: number;
  clock?: Clock;
  fetchImpl?: typeof fetch;
}

/**
 * Request policy shared by every Spotify call: bearer token per attempt,
 * one token refresh on 401.
 */
export function spotifyPolicy(options: SpotifyClientOptions): RequestPolicy {
  return {
    label: "spotify",
    limiter: options.limiter,
    timeoutMs: options.timeoutMs,
    clock: options.clock,
    fetchImpl: options.fetchImpl,
    headers: async () => ({
      Authorization: `Bearer ${await options.tokens.getAccessToken()}`,
    }),
    onUnauthorized: () => options.tokens.invalidate(),
  };
}

export function toCandidateTrack(track: SpotifyTrack): CandidateTrack | null {
  if (!track.id) return null;
  return {
    id: track.id,
    title: track.name ?? "",
    performerNames: (track.artists ?? [])
      .map((a) => a.name ?? "")
      .filter(Boolean),
    popularity: typeof track.popularity === "number" ? track.popularity : 0,
  };
}

export class SpotifyCatalogClient implements CatalogSearchClient {
  private readonly policy: RequestPolicy;

  constructor(options: SpotifyClientOptions) {
    this.policy = spotifyPolicy(options);
  }

  async searchTracks(queryText: string, limit: number): Promise<CandidateTrack[]> {
    const q = queryText.trim();
    if (!q) return [];

    const params = new URLSearchParams({
      q,
      type: "track",
      limit: String(Math.min(Math.max(1, Math.floor(limit)), MAX_SEARCH_LIMIT)),
    });

    const result = await requestJson<SpotifySearchResponse>(
      `${SPOTIFY_API_BASE}/search?${params.toString()}`,
      {},
      this.policy,
    );
    if (!result.ok || !result.data) return [];

    return (result.data.tracks?.items ?? [])
      .map(toCandidateTrack)
      .filter((t): t is CandidateTrack => t !== null);
  }
}
