/**
 * cli.ts
 *
 * Usage: tsx app/cli.ts [--events-file events.csv] [--dry-run]
 *
 * Reads events, resolves each into a lineup, and creates one playlist per
 * event on Spotify or Apple Music (MUSIC_SERVICE). Settings come from the
 * environment (see lib/config.ts).
 */

import { parseArgs } from "util";
import { AppleMusicCatalogClient } from "@/lib/apple/catalog";
import { AppleMusicPlaylistSink } from "@/lib/apple/playlists";
import { loadConfig, type AppConfig } from "@/lib/config";
import { ConfigurationError, errorMessage } from "@/lib/errors";
import { RateLimiter } from "@/lib/http/rateLimiter";
import { logRunSummary } from "@/lib/logging/run";
import { musicBrainzDirectory } from "@/lib/musicbrainz";
import { printSummary, processEvents } from "@/lib/pipeline/processEvents";
import { SetlistFmClient } from "@/lib/setlistfm";
import { DryRunPlaylistSink } from "@/lib/sinks/dryRun";
import { readEventsFromCsv } from "@/lib/sources/csvEvents";
import { SpotifyCatalogClient } from "@/lib/spotify/catalog";
import { SpotifyPlaylistSink } from "@/lib/spotify/playlists";
import { SpotifyTokenProvider } from "@/lib/spotify/token";
import { createTrackResolver } from "@/lib/tracks/resolveTrack";
import type { CatalogSearchClient, PlaylistSink } from "@/lib/types";

function readArgs(config: AppConfig): AppConfig {
  const { values } = parseArgs({
    options: {
      "events-file": { type: "string" },
      "dry-run": { type: "boolean" },
    },
  });
  return {
    ...config,
    eventsFile: values["events-file"] ?? config.eventsFile,
    dryRun: values["dry-run"] ?? config.dryRun,
  };
}

interface MusicBackend {
  catalog: CatalogSearchClient;
  sink: PlaylistSink;
}

/**
 * Catalog and sink for the configured service. Spotify credentials are
 * checked up front by fetching a token; Apple Music tokens are static and
 * surface on the first request.
 */
async function connectBackend(
  config: AppConfig,
  limiter: RateLimiter,
): Promise<MusicBackend> {
  const { catalog } = config;
  if (catalog.service === "apple") {
    const options = {
      credentials: catalog.appleMusic,
      limiter,
      timeoutMs: config.requestTimeoutMs,
    };
    return {
      catalog: new AppleMusicCatalogClient(options),
      sink: new AppleMusicPlaylistSink(options),
    };
  }

  const tokens = new SpotifyTokenProvider(catalog.spotify, {
    timeoutMs: config.requestTimeoutMs,
  });
  await tokens.getAccessToken();
  const options = { tokens, limiter, timeoutMs: config.requestTimeoutMs };
  return {
    catalog: new SpotifyCatalogClient(options),
    sink: new SpotifyPlaylistSink(options),
  };
}

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = readArgs(loadConfig());
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof TypeError) {
      console.error(`[config] ${error.message}`);
      return 1;
    }
    throw error;
  }

  const setlistLimiter = new RateLimiter(config.minRequestIntervalMs);
  const catalogLimiter = new RateLimiter(Math.floor(config.minRequestIntervalMs / 4));

  let backend: MusicBackend;
  try {
    backend = await connectBackend(config, catalogLimiter);
  } catch (error) {
    // Fail fast on bad credentials before touching any event
    console.error(`[${config.catalog.service}] ${errorMessage(error)}`);
    return 1;
  }

  const source = new SetlistFmClient({
    apiKey: config.setlistFmApiKey,
    limiter: setlistLimiter,
    artistDirectory: config.musicBrainzLookup ? musicBrainzDirectory : null,
    logResponses: config.logSetlistResponses,
    timeoutMs: config.requestTimeoutMs,
  });

  const sink: PlaylistSink = config.dryRun ? new DryRunPlaylistSink() : backend.sink;
  if (config.dryRun) {
    console.log("[pipeline] Dry run: no playlists will be written");
  }

  const { events } = await readEventsFromCsv(config.eventsFile);
  if (events.length === 0) {
    console.warn(`[pipeline] No events in ${config.eventsFile}`);
    return 0;
  }

  const { summary } = await processEvents(events, {
    resolver: { source },
    assembler: {
      resolver: createTrackResolver(backend.catalog),
      sink,
      fallbackTrackCount: config.fallbackTrackCount,
    },
  });

  printSummary(summary);
  await logRunSummary(summary);
  return summary.failed > 0 ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[pipeline] Fatal:", error);
    process.exitCode = 1;
  });
