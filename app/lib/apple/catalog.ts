/**
 * catalog.ts
 *
 * Catalog Search Client on the Apple Music catalog.
 *
 * Apple's search takes a plain term: it has no field filters and reports no
 * popularity. A leading "artist:" filter is dropped from the term, and
 * popularity is derived from result rank (first hit 100, then 99, ...), so a
 * popularity sort keeps Apple's relevance order.
 */

import type { AppleMusicCredentials } from "../config";
import { requestJson, type RequestPolicy } from "../http/request";
import type { Clock, RateLimiter } from "../http/rateLimiter";
import type { CandidateTrack, CatalogSearchClient } from "../types";

export const APPLE_MUSIC_API_BASE = "https://api.music.apple.com/v1";
const MAX_SEARCH_LIMIT = 25;

export interface AppleSongAttributes {
  name?: string;
  artistName?: string;
  albumName?: string;
}

export interface AppleSong {
  id?: string;
  type?: string;
  attributes?: AppleSongAttributes;
}

export interface AppleSearchResponse {
  results?: {
    songs?: {
      data?: AppleSong[];
      next?: string;
    };
  };
}

export interface AppleMusicClientOptions {
  credentials: AppleMusicCredentials;
  limiter: RateLimiter;
  timeoutMs?: number;
  clock?: Clock;
  fetchImpl?: typeof fetch;
}

/**
 * Catalog calls carry the developer token only; library calls also carry
 * the listener's Music-User-Token.
 */
export function appleMusicPolicy(
  options: AppleMusicClientOptions,
  scope: "catalog" | "library",
): RequestPolicy {
  const { developerToken, userToken } = options.credentials;
  const headers: Record<string, string> =
    scope === "library"
      ? { Authorization: `Bearer ${developerToken}`, "Music-User-Token": userToken }
      : { Authorization: `Bearer ${developerToken}` };

  return {
    label: "apple",
    limiter: options.limiter,
    timeoutMs: options.timeoutMs,
    clock: options.clock,
    fetchImpl: options.fetchImpl,
    headers: () => headers,
  };
}

export function searchTerm(queryText: string): string {
  return queryText.trim().replace(/^artist:\s*/i, "").trim();
}

export function toCandidateTrack(song: AppleSong, rank: number): CandidateTrack | null {
  if (!song.id) return null;
  const artist = song.attributes?.artistName?.trim() ?? "";
  return {
    id: song.id,
    title: song.attributes?.name ?? "",
    performerNames: artist ? [artist] : [],
    popularity: Math.max(0, 100 - rank),
  };
}

export class AppleMusicCatalogClient implements CatalogSearchClient {
  private readonly policy: RequestPolicy;
  private readonly storefront: string;

  constructor(options: AppleMusicClientOptions) {
    this.policy = appleMusicPolicy(options, "catalog");
    this.storefront = options.credentials.storefront;
  }

  async searchTracks(queryText: string, limit: number): Promise<CandidateTrack[]> {
    const term = searchTerm(queryText);
    if (!term) return [];

    const params = new URLSearchParams({
      term,
      types: "songs",
      limit: String(Math.min(Math.max(1, Math.floor(limit)), MAX_SEARCH_LIMIT)),
    });

    const result = await requestJson<AppleSearchResponse>(
      `${APPLE_MUSIC_API_BASE}/catalog/${encodeURIComponent(this.storefront)}/search?${params.toString()}`,
      {},
      this.policy,
    );
    if (!result.ok || !result.data) return [];

    return (result.data.results?.songs?.data ?? [])
      .map(toCandidateTrack)
      .filter((t): t is CandidateTrack => t !== null);
  }
}
