/**
 * playlists.ts
 *
 * Playlist Sink on the listener's Apple Music library. Write failures throw
 * so the batch runner records the event as failed.
 *
 * Library playlists have no owner id in the API; the account's storefront id
 * stands in for it and doubles as a check that the user token works.
 */

import { chunk } from "../playlist/chunk";
import {
  requestJson,
  type JsonResult,
  type RequestPolicy,
} from "../http/request";
import type { PlaylistSink } from "../types";
import {
  APPLE_MUSIC_API_BASE,
  appleMusicPolicy,
  type AppleMusicClientOptions,
} from "./catalog";

export const ADD_TRACKS_CHUNK = 100;
const LIBRARY_PAGE_LIMIT = 100;
const APPLE_MUSIC_ORIGIN = new URL(APPLE_MUSIC_API_BASE).origin;

interface AppleResource<A> {
  id?: string;
  attributes?: A;
}

interface AppleDocument<A> {
  data?: AppleResource<A>[];
  next?: string;
}

type LibraryPlaylistPage = AppleDocument<{ name?: string }>;

export class AppleMusicPlaylistSink implements PlaylistSink {
  private readonly policy: RequestPolicy;
  private ownerId: string | null = null;

  constructor(options: AppleMusicClientOptions) {
    this.policy = appleMusicPolicy(options, "library");
  }

  async getOwnerId(): Promise<string> {
    if (this.ownerId) return this.ownerId;

    const result = await requestJson<AppleDocument<unknown>>(
      `${APPLE_MUSIC_API_BASE}/me/storefront`,
      {},
      this.policy,
    );
    const id = result.ok ? result.data?.data?.[0]?.id : undefined;
    if (!id) {
      throw new Error(
        `Could not read Apple Music account: ${result.ok ? "no storefront in response" : result.reason}`,
      );
    }

    this.ownerId = id;
    return id;
  }

  async createPlaylist(
    _ownerId: string,
    name: string,
    description: string,
  ): Promise<string> {
    const result = await requestJson<AppleDocument<unknown>>(
      `${APPLE_MUSIC_API_BASE}/me/library/playlists`,
      { method: "POST", body: { attributes: { name, description } } },
      this.policy,
    );
    const id = result.ok ? result.data?.data?.[0]?.id : undefined;
    if (!id) {
      throw new Error(
        `Could not create playlist "${name}": ${result.ok ? "no id in response" : result.reason}`,
      );
    }

    console.log(`[apple] Created playlist "${name}" (${id})`);
    return id;
  }

  async addTracks(playlistId: string, trackIds: string[]): Promise<void> {
    for (const ids of chunk(trackIds, ADD_TRACKS_CHUNK)) {
      const result = await requestJson<unknown>(
        `${APPLE_MUSIC_API_BASE}/me/library/playlists/${encodeURIComponent(playlistId)}/tracks`,
        { method: "POST", body: { data: ids.map((id) => ({ id, type: "songs" })) } },
        this.policy,
      );
      if (!result.ok) {
        throw new Error(
          `Could not add ${ids.length} tracks to ${playlistId}: ${result.reason}`,
        );
      }
    }
  }

  async findPlaylistByName(name: string): Promise<string | null> {
    let url: string | null =
      `${APPLE_MUSIC_API_BASE}/me/library/playlists?limit=${LIBRARY_PAGE_LIMIT}`;

    while (url) {
      const result: JsonResult<LibraryPlaylistPage> =
        await requestJson<LibraryPlaylistPage>(url, {}, this.policy);
      if (!result.ok) {
        throw new Error(`Could not list playlists: ${result.reason}`);
      }

      for (const playlist of result.data?.data ?? []) {
        if (playlist.id && playlist.attributes?.name === name) return playlist.id;
      }
      // next is a path such as "/v1/me/library/playlists?offset=100"
      const next: string | undefined = result.data?.next;
      url = next ? new URL(next, APPLE_MUSIC_ORIGIN).toString() : null;
    }

    return null;
  }
}
