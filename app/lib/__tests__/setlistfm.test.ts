import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  SetlistFmClient,
  extractStartTime,
  fromSetlistFmDate,
  toCandidateRecord,
  toSetlistFmDate,
  type SetlistFmSetlist,
} from "../setlistfm";
import type { ArtistDirectory } from "../types";
import {
  FakeClock,
  instantLimiter,
  jsonResponse,
  queuedFetch,
  requestedUrl,
  silenceConsole,
} from "./helpers";

function setlist(artist: string, songNames: string[] = []): SetlistFmSetlist {
  return {
    eventDate: "01-05-2024",
    artist: { name: artist },
    venue: { name: "The Hall", city: { name: "Springfield" } },
    sets: { set: [{ song: songNames.map((name) => ({ name })) }] },
  };
}

describe("setlist.fm dates", () => {
  it("converts ISO dates to dd-MM-yyyy", () => {
    expect(toSetlistFmDate("2024-05-01")).toBe("01-05-2024");
  });

  it("rejects dates that are not real or not ISO", () => {
    expect(toSetlistFmDate("2024-02-30")).toBeNull();
    expect(toSetlistFmDate("05/01/2024")).toBeNull();
  });

  it("converts dd-MM-yyyy back to ISO and passes junk through", () => {
    expect(fromSetlistFmDate("01-05-2024")).toBe("2024-05-01");
    expect(fromSetlistFmDate("sometime")).toBe("sometime");
  });
});

describe("extractStartTime", () => {
  it("finds a set time in free text", () => {
    expect(extractStartTime("Set time 8:45")).toBe("08:45");
    expect(extractStartTime("Stage: 20:45:30, main stage")).toBe("20:45:30");
  });

  it("returns undefined without a time", () => {
    expect(extractStartTime(undefined)).toBeUndefined();
    expect(extractStartTime("Last show of the tour")).toBeUndefined();
  });
});

describe("toCandidateRecord", () => {
  it("flattens sets, skips tape entries and cleans titles", () => {
    const result = toCandidateRecord({
      eventDate: "01-05-2024",
      lastUpdated: "2024-05-02T10:00:00.000+0000",
      info: "Set time 21:00",
      artist: { name: " Alice " },
      venue: { name: "The Hall", city: { name: "Springfield" } },
      sets: {
        set: [
          {
            song: [
              { name: "Intro", tape: true },
              { name: "First (Acoustic)" },
              { name: "" },
              { name: "Second" },
            ],
          },
          { encore: 1, song: [{ name: "Encore" }] },
        ],
      },
    });

    expect(result).toEqual({
      performerName: "Alice",
      venueName: "The Hall",
      cityName: "Springfield",
      eventDate: "2024-05-01",
      songs: ["First", "Second", "Encore"],
      startTime: "21:00",
      lastUpdated: "2024-05-02T10:00:00.000+0000",
    });
  });

  it("keeps a performer with no songs", () => {
    expect(toCandidateRecord(setlist("Bob"))?.songs).toEqual([]);
  });

  it("drops setlists without an artist name", () => {
    expect(toCandidateRecord({ eventDate: "01-05-2024" })).toBeNull();
  });
});

describe("SetlistFmClient", () => {
  let clock: FakeClock;

  beforeEach(() => {
    clock = new FakeClock();
    silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function client(
    fetchImpl: ReturnType<typeof queuedFetch>,
    artistDirectory?: ArtistDirectory,
  ): SetlistFmClient {
    return new SetlistFmClient({
      apiKey: "test-key",
      limiter: instantLimiter(clock),
      clock,
      fetchImpl,
      artistDirectory,
    });
  }

  it("searches by artist name and setlist.fm date with the API key", async () => {
    const fetchImpl = queuedFetch(
      jsonResponse(200, { total: 1, itemsPerPage: 20, setlist: [setlist("Alice", ["One"])] }),
    );

    const records = await client(fetchImpl).searchByArtistAndDate("Alice", "2024-05-01");

    expect(records.map((r) => r.performerName)).toEqual(["Alice"]);
    const url = requestedUrl(fetchImpl.mock.calls[0][0]);
    expect(url.pathname).toBe("/rest/1.0/search/setlists");
    expect(url.searchParams.get("artistName")).toBe("Alice");
    expect(url.searchParams.get("date")).toBe("01-05-2024");
    expect(url.searchParams.get("p")).toBe("1");
    expect(fetchImpl.mock.calls[0][1]?.headers).toMatchObject({ "x-api-key": "test-key" });
  });

  it("follows pages until a short page", async () => {
    const fetchImpl = queuedFetch(
      jsonResponse(200, {
        total: 3,
        itemsPerPage: 2,
        setlist: [setlist("Alice"), setlist("Bob")],
      }),
      jsonResponse(200, { total: 3, itemsPerPage: 2, setlist: [setlist("Carol")] }),
    );

    const records = await client(fetchImpl).searchByVenueCityDate(
      "The Hall",
      "Springfield",
      "2024-05-01",
    );

    expect(records.map((r) => r.performerName)).toEqual(["Alice", "Bob", "Carol"]);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(requestedUrl(fetchImpl.mock.calls[1][0]).searchParams.get("p")).toBe("2");
  });

  it("leaves out empty venue or city parameters", async () => {
    const fetchImpl = queuedFetch(jsonResponse(404));

    await client(fetchImpl).searchByVenueCityDate("The Hall", " ", "2024-05-01");

    const url = requestedUrl(fetchImpl.mock.calls[0][0]);
    expect(url.searchParams.get("venueName")).toBe("The Hall");
    expect(url.searchParams.has("cityName")).toBe(false);
  });

  it("treats 404 as no results", async () => {
    const fetchImpl = queuedFetch(jsonResponse(404, { code: 404 }));

    const records = await client(fetchImpl).searchByArtistAndDate("Nobody", "2024-05-01");

    expect(records).toEqual([]);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("retries by MusicBrainz id when the name search finds nothing", async () => {
    const fetchImpl = queuedFetch(
      jsonResponse(404),
      jsonResponse(200, { total: 1, itemsPerPage: 20, setlist: [setlist("Alice")] }),
    );
    const directory = { findArtistId: vi.fn(async () => "mbid-1") };

    const records = await client(fetchImpl, directory).searchByArtistAndDate(
      "Alice",
      "2024-05-01",
    );

    expect(records).toHaveLength(1);
    expect(directory.findArtistId).toHaveBeenCalledWith("Alice");
    const url = requestedUrl(fetchImpl.mock.calls[1][0]);
    expect(url.searchParams.get("artistMbid")).toBe("mbid-1");
    expect(url.searchParams.has("artistName")).toBe(false);
  });

  it("does not call the API for an invalid date", async () => {
    const fetchImpl = queuedFetch();

    const records = await client(fetchImpl).searchByArtistAndDate("Alice", "2024-13-01");

    expect(records).toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
