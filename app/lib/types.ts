// lib/types.ts

/**
 * One row of input: "artist played venue/city on date".
 * `date` is always an ISO calendar date (YYYY-MM-DD).
 */
export interface EventQuery {
  readonly artist: string;
  readonly venue?: string;
  readonly city?: string;
  readonly date: string;
  readonly eventName?: string;
  readonly isFestivalHint?: boolean;
}

/**
 * One performer-at-venue-on-date record as returned by the setlist source.
 */
export interface CandidateRecord {
  performerName: string;
  venueName: string;
  cityName: string;
  eventDate: string; // YYYY-MM-DD
  songs: string[];
  startTime?: string; // "HH:MM" or "HH:MM:SS"
  lastUpdated?: string;
}

/** [hours, minutes, seconds] */
export type StartTime = readonly [number, number, number];

export interface LineupEntry {
  name: string;
  songs: string[]; // empty -> no setlist recorded, use the popularity fallback
  startTime: StartTime | null;
  lastUpdated: string | null;
}

interface ResolvedEventBase {
  venue: string;
  city: string;
  date: string;
}

export interface ResolvedShow extends ResolvedEventBase {
  isFestival: false;
  headliner: LineupEntry;
  openers: LineupEntry[];
}

export interface ResolvedFestival extends ResolvedEventBase {
  isFestival: true;
  festivalLabel: string;
  lineup: LineupEntry[];
}

export type ResolvedEvent = ResolvedShow | ResolvedFestival;

export interface SongQuery {
  title: string;
  artistHint: string;
}

export interface TrackMatch {
  trackId: string;
  confidence: number;
}

export interface CandidateTrack {
  id: string;
  title: string;
  performerNames: string[];
  popularity: number;
}

export interface PlaylistPlan {
  name: string;
  description: string;
  trackIds: string[];
}

/**
 * Assembler work item. `kind` records provenance: "song" came from a real
 * setlist and still needs a catalog search, "resolved" came from the
 * popularity fallback and is already a catalog id.
 */
export type PlaylistPair =
  | { kind: "song"; title: string; artistHint: string }
  | { kind: "resolved"; trackId: string; performer: string };

// ---------------------------------------------------------------------------
// Collaborator interfaces
// ---------------------------------------------------------------------------

export interface SetlistSourceClient {
  searchByArtistAndDate(artist: string, date: string): Promise<CandidateRecord[]>;
  searchByVenueCityDate(
    venue: string,
    city: string,
    date: string,
  ): Promise<CandidateRecord[]>;
}

export interface CatalogSearchClient {
  searchTracks(queryText: string, limit: number): Promise<CandidateTrack[]>;
}

export interface PlaylistSink {
  getOwnerId(): Promise<string>;
  createPlaylist(
    ownerId: string,
    name: string,
    description: string,
  ): Promise<string>;
  addTracks(playlistId: string, trackIds: string[]): Promise<void>;
  findPlaylistByName(name: string): Promise<string | null>;
}

export interface TokenProvider {
  getAccessToken(): Promise<string>;
  invalidate(): void;
}

export interface ArtistDirectory {
  findArtistId(name: string): Promise<string | null>;
}
