/**
 * Shared fakes for tests: a manual clock, canned fetch responses and
 * in-memory collaborators.
 */

import { vi } from "vitest";
import { RateLimiter, type Clock } from "../http/rateLimiter";
import type {
  CandidateRecord,
  CandidateTrack,
  CatalogSearchClient,
  SetlistSourceClient,
} from "../types";

export class FakeClock implements Clock {
  time = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}

export function instantLimiter(clock: Clock): RateLimiter {
  return new RateLimiter(0, clock);
}

export function jsonResponse(
  status: number,
  body?: unknown,
  headers: Record<string, string> = {},
): Response {
  return new Response(body === undefined ? null : JSON.stringify(body), {
    status,
    headers,
  });
}

/**
 * fetch stand-in answering from a queue, one entry per call.
 */
export function queuedFetch(...responses: (Response | Error)[]) {
  const queue = [...responses];
  return vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      const next = queue.shift();
      if (!next) throw new Error("unexpected request");
      if (next instanceof Error) throw next;
      return next;
    },
  );
}

export function requestedUrl(input: string | URL | Request): URL {
  return new URL(input instanceof Request ? input.url : String(input));
}

export function silenceConsole(): void {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
}

export function record(
  performerName: string,
  overrides: Partial<CandidateRecord> = {},
): CandidateRecord {
  return {
    performerName,
    venueName: "The Hall",
    cityName: "Springfield",
    eventDate: "2024-05-01",
    songs: [],
    ...overrides,
  };
}

export function songs(count: number, prefix = "Song"): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix} ${i + 1}`);
}

/**
 * Setlist source answering from fixed record lists.
 */
export function fakeSource(data: {
  byArtist?: CandidateRecord[];
  byVenue?: CandidateRecord[];
}) {
  const source = {
    searchByArtistAndDate: vi.fn(
      async (_artist: string, _date: string): Promise<CandidateRecord[]> =>
        data.byArtist ?? [],
    ),
    searchByVenueCityDate: vi.fn(
      async (_venue: string, _city: string, _date: string): Promise<CandidateRecord[]> =>
        data.byVenue ?? [],
    ),
  } satisfies SetlistSourceClient;
  return source;
}

export function track(
  id: string,
  title: string,
  performer: string,
  popularity = 50,
): CandidateTrack {
  return { id, title, performerNames: [performer], popularity };
}

/**
 * Catalog answering by exact query text.
 */
export function fakeCatalog(results: Record<string, CandidateTrack[]>) {
  const catalog = {
    searchTracks: vi.fn(
      async (queryText: string, _limit: number): Promise<CandidateTrack[]> =>
        results[queryText] ?? [],
    ),
  } satisfies CatalogSearchClient;
  return catalog;
}
