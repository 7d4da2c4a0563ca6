/**
 * resolveEvent.ts
 *
 * Event Resolution Engine
 *
 * Flow:
 * 1. Search by artist + date, keep records on exactly the query date
 * 2. Nothing? Search the query's venue/city on that date. A bill of 3+
 *    performers is a festival, anything smaller is "not found"
 * 3. Found the artist? Re-search the venue/city the record itself names to
 *    pick up co-billed performers. 3+ performers is a festival, otherwise
 *    pick a headliner and sort the rest as openers
 *
 * A caller-supplied isFestivalHint overrides the performer-count rule.
 */

import { matchPolicy, type MatchPolicy } from "../config";
import { similarity } from "../match/similarity";
import type {
  CandidateRecord,
  EventQuery,
  LineupEntry,
  ResolvedEvent,
  ResolvedFestival,
  SetlistSourceClient,
} from "../types";
import {
  buildLineup,
  distinctPerformerCount,
  performerKey,
  sortLineup,
} from "./lineup";

export interface EventResolverDeps {
  source: SetlistSourceClient;
  policy?: Partial<MatchPolicy>;
}

function onDate(records: CandidateRecord[], date: string): CandidateRecord[] {
  return records.filter((r) => r.eventDate === date);
}

function isFestivalBill(
  records: CandidateRecord[],
  hint: boolean | undefined,
  policy: MatchPolicy,
): boolean {
  const performers = distinctPerformerCount(records);
  if (hint === true) return performers >= 1;
  if (hint === false) return false;
  return performers >= policy.festivalMinPerformers;
}

function buildFestival(
  query: EventQuery,
  records: CandidateRecord[],
  venue: string,
  city: string,
): ResolvedFestival {
  const lineup = sortLineup(buildLineup(records));
  const festivalLabel = query.eventName?.trim() || query.artist;

  console.log(
    `[events] Festival "${festivalLabel}" with ${lineup.length} performers: ${lineup
      .map((e) => e.name)
      .join(", ")}`,
  );

  return {
    isFestival: true,
    festivalLabel,
    lineup,
    venue,
    city,
    date: query.date,
  };
}

/**
 * Headliner: the best name match for the queried artist if it clears the
 * threshold, else the performer with the longest setlist. Ties keep the
 * earlier entry.
 */
export function pickHeadliner(
  artist: string,
  lineup: LineupEntry[],
  threshold: number,
): LineupEntry | null {
  if (lineup.length === 0) return null;

  let bestMatch = lineup[0];
  let bestScore = -1;
  for (const entry of lineup) {
    const score = similarity(artist, entry.name);
    if (score > bestScore) {
      bestScore = score;
      bestMatch = entry;
    }
  }
  if (bestScore >= threshold) return bestMatch;

  let longest = lineup[0];
  for (const entry of lineup) {
    if (entry.songs.length > longest.songs.length) longest = entry;
  }
  console.log(
    `[events] No performer matched "${artist}" (best ${bestScore}); using longest setlist: ${longest.name}`,
  );
  return longest;
}

/**
 * Choose which artist-search record anchors the show when several share the
 * date (e.g. the same artist name used by two acts).
 */
function pickAnchorRecord(
  artist: string,
  records: CandidateRecord[],
): CandidateRecord {
  let best = records[0];
  let bestScore = similarity(artist, best.performerName);
  for (const record of records.slice(1)) {
    const score = similarity(artist, record.performerName);
    if (score > bestScore) {
      best = record;
      bestScore = score;
    }
  }
  return best;
}

export async function resolveEvent(
  query: EventQuery,
  deps: EventResolverDeps,
): Promise<ResolvedEvent | null> {
  const policy = matchPolicy(deps.policy);
  const { source } = deps;

  // Step 1: artist + date
  const byArtist = onDate(
    await source.searchByArtistAndDate(query.artist, query.date),
    query.date,
  );

  // Step 2: no artist record on that date, fall back to the venue hints
  if (byArtist.length === 0) {
    const venueHint = query.venue?.trim() ?? "";
    const cityHint = query.city?.trim() ?? "";
    if (!venueHint && !cityHint) {
      console.warn(
        `[events] No setlist for ${query.artist} on ${query.date} and no venue/city to fall back on`,
      );
      return null;
    }

    const atVenue = onDate(
      await source.searchByVenueCityDate(venueHint, cityHint, query.date),
      query.date,
    );

    if (isFestivalBill(atVenue, query.isFestivalHint, policy)) {
      return buildFestival(
        query,
        atVenue,
        atVenue[0].venueName || venueHint,
        atVenue[0].cityName || cityHint,
      );
    }

    console.warn(
      `[events] No usable setlist data for ${query.artist} on ${query.date} (${distinctPerformerCount(atVenue)} performers at venue)`,
    );
    return null;
  }

  // Step 3: re-query the venue the record names to find co-billed acts
  const anchor = pickAnchorRecord(query.artist, byArtist);
  const venue = anchor.venueName;
  const city = anchor.cityName;

  // A record without venue or city would turn the re-query into "every show
  // that day"
  let records =
    venue || city
      ? onDate(await source.searchByVenueCityDate(venue, city, query.date), query.date)
      : [];
  if (records.length === 0) {
    records = byArtist.filter(
      (r) => r.venueName === venue && r.cityName === city,
    );
  } else if (
    !records.some(
      (r) => performerKey(r.performerName) === performerKey(anchor.performerName),
    )
  ) {
    records = [...records, anchor];
  }

  if (isFestivalBill(records, query.isFestivalHint, policy)) {
    return buildFestival(query, records, venue, city);
  }

  const lineup = buildLineup(records);
  const headliner = pickHeadliner(
    query.artist,
    lineup,
    policy.headlinerMatchThreshold,
  );
  if (!headliner) {
    console.warn(`[events] Empty lineup for ${query.artist} on ${query.date}`);
    return null;
  }

  const openers = sortLineup(lineup.filter((entry) => entry !== headliner));

  console.log(
    `[events] ${headliner.name} (${headliner.songs.length} songs) at ${venue}, ${city}` +
      (openers.length > 0
        ? ` with openers: ${openers.map((o) => o.name).join(", ")}`
        : ""),
  );

  return {
    isFestival: false,
    headliner,
    openers,
    venue,
    city,
    date: query.date,
  };
}
