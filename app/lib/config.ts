/**
 * config.ts
 *
 * Environment-driven settings plus the matching policy.
 */

import { ConfigurationError } from "./errors";

/**
 * Heuristic thresholds on the 0..100 similarity scale.
 *
 * - festivalMinPerformers: distinct performers at one venue/date before the
 *   show is read as a festival bill.
 * - headlinerMatchThreshold: name score a performer needs to be taken as the
 *   queried headliner; below it the longest setlist wins.
 * - artistMatchThreshold: name score a MusicBrainz artist needs before its id
 *   is used to re-query setlist.fm.
 * - usableConfidence: TrackMatch confidence below which the assembler drops
 *   the match.
 */
export const MATCH_POLICY = {
  festivalMinPerformers: 3,
  headlinerMatchThreshold: 80,
  artistMatchThreshold: 85,
  usableConfidence: 60,
} as const;

export type MatchPolicy = {
  [K in keyof typeof MATCH_POLICY]: number;
};

export function matchPolicy(overrides: Partial<MatchPolicy> = {}): MatchPolicy {
  return { ...MATCH_POLICY, ...overrides };
}

export interface SpotifyCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface AppleMusicCredentials {
  developerToken: string;
  userToken: string;
  storefront: string;
}

/**
 * Which music service is searched and written to.
 */
export type CatalogConfig =
  | { service: "spotify"; spotify: SpotifyCredentials }
  | { service: "apple"; appleMusic: AppleMusicCredentials };

export interface AppConfig {
  setlistFmApiKey: string;
  catalog: CatalogConfig;
  dryRun: boolean;
  eventsFile: string;
  fallbackTrackCount: number;
  minRequestIntervalMs: number;
  requestTimeoutMs: number;
  musicBrainzLookup: boolean;
  logSetlistResponses: boolean;
}

type Env = Record<string, string | undefined>;

const SERVICE_VARS = {
  spotify: ["SPOTIFY_CLIENT_ID", "SPOTIFY_CLIENT_SECRET", "SPOTIFY_REFRESH_TOKEN"],
  apple: ["APPLE_DEVELOPER_TOKEN", "APPLE_USER_TOKEN"],
} as const;

type MusicService = keyof typeof SERVICE_VARS;

function readService(raw: string | undefined): MusicService {
  const value = raw?.trim().toLowerCase() || "spotify";
  if (value === "spotify" || value === "apple") return value;
  throw new ConfigurationError(
    `MUSIC_SERVICE must be "spotify" or "apple", got "${raw}"`,
  );
}

function readFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return ["1", "true", "yes"].includes(value.trim().toLowerCase());
}

function readPositiveInt(
  env: Env,
  name: string,
  fallback: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer`);
  }
  return value;
}

/**
 * Build the run configuration from environment variables.
 * Throws ConfigurationError listing every missing required variable.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const service = readService(env.MUSIC_SERVICE);
  const required = ["SETLISTFM_API_KEY", ...SERVICE_VARS[service]];
  const missing = required.filter((name) => !env[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(", ")}`,
      missing,
    );
  }

  const value = (name: string): string => (env[name] ?? "").trim();

  const catalog: CatalogConfig =
    service === "apple"
      ? {
          service,
          appleMusic: {
            developerToken: value("APPLE_DEVELOPER_TOKEN"),
            userToken: value("APPLE_USER_TOKEN"),
            storefront: value("APPLE_STOREFRONT").toLowerCase() || "us",
          },
        }
      : {
          service,
          spotify: {
            clientId: value("SPOTIFY_CLIENT_ID"),
            clientSecret: value("SPOTIFY_CLIENT_SECRET"),
            refreshToken: value("SPOTIFY_REFRESH_TOKEN"),
          },
        };

  return {
    setlistFmApiKey: value("SETLISTFM_API_KEY"),
    catalog,
    dryRun: readFlag(env.DRY_RUN, false),
    eventsFile: env.EVENTS_FILE?.trim() || "events.csv",
    fallbackTrackCount: readPositiveInt(env, "FALLBACK_TRACK_COUNT", 5),
    minRequestIntervalMs: readPositiveInt(env, "MIN_REQUEST_INTERVAL_MS", 1000),
    requestTimeoutMs: readPositiveInt(env, "REQUEST_TIMEOUT_MS", 15000),
    musicBrainzLookup: readFlag(env.MUSICBRAINZ_LOOKUP, true),
    logSetlistResponses: readFlag(env.LOG_SETLIST_RESPONSES, false),
  };
}
