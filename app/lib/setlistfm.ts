// lib/setlistfm.ts
import { format, isValid, parse } from "date-fns";
import { requestJson, type RequestPolicy } from "./http/request";
import type { RateLimiter, Clock } from "./http/rateLimiter";
import { logSetlistFmResponse } from "./logging/setlistfm";
import { cleanSongTitle } from "./match/normalize";
import type {
  ArtistDirectory,
  CandidateRecord,
  SetlistSourceClient,
} from "./types";

const SETLISTFM_API_BASE = "https://api.setlist.fm/rest/1.0";
const ISO_DATE = "yyyy-MM-dd";
const SETLISTFM_DATE = "dd-MM-yyyy";
const DEFAULT_MAX_PAGES = 3;

interface SetlistFmSong {
  name?: string;
  tape?: boolean;
  info?: string;
}

interface SetlistFmSet {
  name?: string;
  encore?: number;
  song?: SetlistFmSong[];
}

export interface SetlistFmSetlist {
  id?: string;
  eventDate?: string; // dd-MM-yyyy
  lastUpdated?: string; // ISO timestamp
  info?: string;
  artist?: { mbid?: string; name?: string };
  venue?: { name?: string; city?: { name?: string } };
  sets?: { set?: SetlistFmSet[] };
}

export interface SetlistFmSearchResponse {
  type?: string;
  total?: number;
  page?: number;
  itemsPerPage?: number;
  setlist?: SetlistFmSetlist[];
}

/**
 * Convert an ISO date (YYYY-MM-DD) to setlist.fm's dd-MM-yyyy.
 * Returns null for anything that is not a real calendar date.
 */
export function toSetlistFmDate(isoDate: string): string | null {
  const parsed = parse(isoDate.trim(), ISO_DATE, new Date());
  if (!isValid(parsed) || format(parsed, ISO_DATE) !== isoDate.trim()) {
    return null;
  }
  return format(parsed, SETLISTFM_DATE);
}

/**
 * Convert setlist.fm's dd-MM-yyyy back to ISO. Unparseable input is returned
 * unchanged so it never equals a real query date.
 */
export function fromSetlistFmDate(value: string): string {
  const parsed = parse(value.trim(), SETLISTFM_DATE, new Date());
  return isValid(parsed) ? format(parsed, ISO_DATE) : value;
}

const START_TIME_PATTERN = /\b([01]?\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?\b/;

/**
 * setlist.fm has no start-time field; editors put set times in the free-text
 * info ("Set time 20:45").
 */
export function extractStartTime(info: string | undefined): string | undefined {
  if (!info) return undefined;
  const match = info.match(START_TIME_PATTERN);
  if (!match) return undefined;
  const [, hours, minutes, seconds] = match;
  const hh = hours.padStart(2, "0");
  return seconds ? `${hh}:${minutes}:${seconds}` : `${hh}:${minutes}`;
}

/**
 * Turn one setlist.fm setlist into a candidate record. Songs from every set
 * (main, encores, named sets) are kept in order; tape entries are skipped and
 * bracketed annotations are stripped from titles.
 */
export function toCandidateRecord(setlist: SetlistFmSetlist): CandidateRecord | null {
  const performerName = setlist.artist?.name?.trim() ?? "";
  if (!performerName) return null;

  const songs: string[] = [];
  for (const set of setlist.sets?.set ?? []) {
    for (const song of set.song ?? []) {
      const name = song.name?.trim();
      if (!name || song.tape) continue;
      songs.push(cleanSongTitle(name) || name);
    }
  }

  const record: CandidateRecord = {
    performerName,
    venueName: setlist.venue?.name?.trim() ?? "",
    cityName: setlist.venue?.city?.name?.trim() ?? "",
    eventDate: fromSetlistFmDate(setlist.eventDate ?? ""),
    songs,
  };

  const startTime = extractStartTime(setlist.info);
  if (startTime) record.startTime = startTime;
  if (setlist.lastUpdated) record.lastUpdated = setlist.lastUpdated;

  return record;
}

export interface SetlistFmClientOptions {
  apiKey: string;
  limiter: RateLimiter;
  artistDirectory?: ArtistDirectory | null;
  maxPages?: number;
  logResponses?: boolean;
  timeoutMs?: number;
  clock?: Clock;
  fetchImpl?: typeof fetch;
}

export class SetlistFmClient implements SetlistSourceClient {
  private readonly policy: RequestPolicy;
  private readonly artistDirectory: ArtistDirectory | null;
  private readonly maxPages: number;
  private readonly logResponses: boolean;

  constructor(options: SetlistFmClientOptions) {
    this.artistDirectory = options.artistDirectory ?? null;
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    this.logResponses = options.logResponses ?? false;
    this.policy = {
      label: "setlistfm",
      limiter: options.limiter,
      timeoutMs: options.timeoutMs,
      clock: options.clock,
      fetchImpl: options.fetchImpl,
      headers: () => ({ "x-api-key": options.apiKey }),
    };
  }

  async searchByArtistAndDate(
    artist: string,
    date: string,
  ): Promise<CandidateRecord[]> {
    const apiDate = toSetlistFmDate(date);
    if (!apiDate) {
      console.warn(`[setlistfm] Invalid date for ${artist}: ${date}`);
      return [];
    }

    console.log(`[setlistfm] Searching setlists for ${artist} on ${apiDate}`);
    const records = await this.search("artist", {
      artistName: artist,
      date: apiDate,
    });
    if (records.length > 0 || !this.artistDirectory) return records;

    const mbid = await this.artistDirectory.findArtistId(artist);
    if (!mbid) return records;

    console.log(`[setlistfm] Retrying ${artist} by MusicBrainz id ${mbid}`);
    return this.search("artist", { artistMbid: mbid, date: apiDate });
  }

  async searchByVenueCityDate(
    venue: string,
    city: string,
    date: string,
  ): Promise<CandidateRecord[]> {
    const apiDate = toSetlistFmDate(date);
    if (!apiDate) {
      console.warn(`[setlistfm] Invalid date for ${venue || city}: ${date}`);
      return [];
    }

    const params: Record<string, string> = { date: apiDate };
    if (venue.trim()) params.venueName = venue.trim();
    if (city.trim()) params.cityName = city.trim();

    console.log(
      `[setlistfm] Searching setlists at ${venue || "?"}, ${city || "?"} on ${apiDate}`,
    );
    return this.search("venue", params);
  }

  private async search(
    endpoint: "artist" | "venue",
    params: Record<string, string>,
  ): Promise<CandidateRecord[]> {
    const setlists: SetlistFmSetlist[] = [];

    for (let page = 1; page <= this.maxPages; page++) {
      const query = new URLSearchParams({ ...params, p: String(page) });
      const result = await requestJson<SetlistFmSearchResponse>(
        `${SETLISTFM_API_BASE}/search/setlists?${query.toString()}`,
        {},
        this.policy,
      );

      // setlist.fm answers 404 when a search has no hits
      if (!result.ok || !result.data) break;

      if (page === 1 && this.logResponses) {
        await logSetlistFmResponse(endpoint, params, result.data);
      }

      const batch = result.data.setlist ?? [];
      setlists.push(...batch);

      const perPage = result.data.itemsPerPage ?? batch.length;
      const total = result.data.total ?? setlists.length;
      if (batch.length === 0 || batch.length < perPage || setlists.length >= total) {
        break;
      }
    }

    return setlists
      .map(toCandidateRecord)
      .filter((r): r is CandidateRecord => r !== null);
  }
}
