/**
 * csvEvents.ts
 *
 * Reads EventQuery rows from a CSV with the header
 *   artist,event_name,venue,city,date,is_festival
 * Bad rows are dropped with a warning and reported back, never fatal.
 */

import { readFile } from "fs/promises";
import { parse } from "csv-parse/sync";
import { format, isValid, parse as parseDate } from "date-fns";
import { z } from "zod";
import type { EventQuery } from "../types";

const ISO_DATE = "yyyy-MM-dd";

function isCalendarDate(value: string): boolean {
  const parsed = parseDate(value, ISO_DATE, new Date());
  return isValid(parsed) && format(parsed, ISO_DATE) === value;
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const festivalFlag = z
  .string()
  .optional()
  .transform((value, ctx): boolean | undefined => {
    const flag = value?.trim().toLowerCase() ?? "";
    if (flag === "") return undefined;
    if (["true", "yes", "1"].includes(flag)) return true;
    if (["false", "no", "0"].includes(flag)) return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `is_festival must be true/false, got "${value}"`,
    });
    return z.NEVER;
  });

export const eventRowSchema = z
  .object({
    artist: z.string().trim().min(1, "artist is required"),
    event_name: optionalText,
    venue: optionalText,
    city: optionalText,
    date: z
      .string()
      .trim()
      .min(1, "date is required")
      .refine(isCalendarDate, "date must be YYYY-MM-DD"),
    is_festival: festivalFlag,
  })
  .transform((row): EventQuery => {
    const query: {
      artist: string;
      date: string;
      venue?: string;
      city?: string;
      eventName?: string;
      isFestivalHint?: boolean;
    } = { artist: row.artist, date: row.date };
    if (row.venue) query.venue = row.venue;
    if (row.city) query.city = row.city;
    if (row.event_name) query.eventName = row.event_name;
    if (row.is_festival !== undefined) query.isFestivalHint = row.is_festival;
    return query;
  });

export interface RejectedRow {
  row: number; // 1-based data row, header excluded
  reason: string;
}

export interface EventsReadResult {
  events: EventQuery[];
  rejected: RejectedRow[];
}

export function parseEventsCsv(content: string): EventsReadResult {
  const rows: unknown[] = parse(content, {
    columns: (header: string[]) => header.map((h) => h.trim().toLowerCase()),
    skip_empty_lines: true,
    bom: true,
    relax_column_count: true,
  });

  const events: EventQuery[] = [];
  const rejected: RejectedRow[] = [];

  rows.forEach((row, index) => {
    const result = eventRowSchema.safeParse(row);
    if (result.success) {
      events.push(result.data);
      return;
    }

    const reason = result.error.issues
      .map((issue) => `${issue.path.join(".") || "row"}: ${issue.message}`)
      .join("; ");
    console.warn(`[events] Skipping CSV row ${index + 1}: ${reason}`);
    rejected.push({ row: index + 1, reason });
  });

  return { events, rejected };
}

export async function readEventsFromCsv(path: string): Promise<EventsReadResult> {
  const content = await readFile(path, "utf8");
  const result = parseEventsCsv(content);
  console.log(
    `[events] Read ${result.events.length} events from ${path}` +
      (result.rejected.length > 0 ? ` (${result.rejected.length} rejected)` : ""),
  );
  return result;
}
