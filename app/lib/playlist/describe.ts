// lib/playlist/describe.ts
import type { EventQuery, ResolvedEvent } from "../types";

export const MAX_PLAYLIST_NAME = 100;
export const MAX_PLAYLIST_DESCRIPTION = 300;

function joinParts(parts: string[]): string {
  return parts.map((p) => p.trim()).filter(Boolean).join(" - ");
}

/**
 * "{artist} - {date}" for a show, "{festival} - {date}" for a festival.
 */
export function playlistName(event: ResolvedEvent, query: EventQuery): string {
  const title = event.isFestival ? event.festivalLabel : query.artist;
  return joinParts([title, event.date]).slice(0, MAX_PLAYLIST_NAME);
}

/**
 * "{date} - {venue} - {city}" for a show, "{date} - {city}" for a festival.
 * Empty parts are left out.
 */
export function playlistDescription(
  event: ResolvedEvent,
  query: EventQuery,
): string {
  const city = event.city || query.city || "";
  const parts = event.isFestival
    ? [event.date, city]
    : [event.date, event.venue || query.venue || "", city];
  return joinParts(parts).slice(0, MAX_PLAYLIST_DESCRIPTION);
}
