/**
 * playlists.ts
 *
 * Playlist Sink on the Spotify Web API. Write failures throw so the batch
 * runner records the event as failed.
 */

import {
  requestJson,
  type JsonResult,
  type RequestPolicy,
} from "../http/request";
import { chunk } from "../playlist/chunk";
import type { PlaylistSink } from "../types";
import {
  SPOTIFY_API_BASE,
  spotifyPolicy,
  type SpotifyClientOptions,
} from "./catalog";

export const MAX_NAME_LENGTH = 100;
export const MAX_DESCRIPTION_LENGTH = 300;
export const ADD_TRACKS_CHUNK = 100;

interface SpotifyUser {
  id?: string;
}

interface SpotifyPlaylist {
  id?: string;
  name?: string;
}

interface SpotifyPlaylistPage {
  items?: (SpotifyPlaylist | null)[];
  next?: string | null;
}

export function toTrackUri(trackId: string): string {
  return trackId.startsWith("spotify:track:") ? trackId : `spotify:track:${trackId}`;
}

export class SpotifyPlaylistSink implements PlaylistSink {
  private readonly policy: RequestPolicy;
  private ownerId: string | null = null;

  constructor(options: SpotifyClientOptions) {
    this.policy = spotifyPolicy(options);
  }

  async getOwnerId(): Promise<string> {
    if (this.ownerId) return this.ownerId;

    const result = await requestJson<SpotifyUser>(
      `${SPOTIFY_API_BASE}/me`,
      {},
      this.policy,
    );
    if (!result.ok || !result.data?.id) {
      throw new Error(
        `Could not read Spotify user: ${result.ok ? "no id in response" : result.reason}`,
      );
    }

    this.ownerId = result.data.id;
    return this.ownerId;
  }

  async createPlaylist(
    ownerId: string,
    name: string,
    description: string,
  ): Promise<string> {
    const result = await requestJson<SpotifyPlaylist>(
      `${SPOTIFY_API_BASE}/users/${encodeURIComponent(ownerId)}/playlists`,
      {
        method: "POST",
        body: {
          name: name.slice(0, MAX_NAME_LENGTH),
          description: description.slice(0, MAX_DESCRIPTION_LENGTH),
          public: false,
        },
      },
      this.policy,
    );
    if (!result.ok || !result.data?.id) {
      throw new Error(
        `Could not create playlist "${name}": ${result.ok ? "no id in response" : result.reason}`,
      );
    }

    console.log(`[spotify] Created playlist "${name}" (${result.data.id})`);
    return result.data.id;
  }

  async addTracks(playlistId: string, trackIds: string[]): Promise<void> {
    for (const uris of chunk(trackIds.map(toTrackUri), ADD_TRACKS_CHUNK)) {
      const result = await requestJson<unknown>(
        `${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}/tracks`,
        { method: "POST", body: { uris } },
        this.policy,
      );
      if (!result.ok) {
        throw new Error(
          `Could not add ${uris.length} tracks to ${playlistId}: ${result.reason}`,
        );
      }
    }
  }

  async findPlaylistByName(name: string): Promise<string | null> {
    let url: string | null = `${SPOTIFY_API_BASE}/me/playlists?limit=50`;

    while (url) {
      const result: JsonResult<SpotifyPlaylistPage> =
        await requestJson<SpotifyPlaylistPage>(url, {}, this.policy);
      if (!result.ok) {
        throw new Error(`Could not list playlists: ${result.reason}`);
      }

      for (const playlist of result.data?.items ?? []) {
        if (playlist?.id && playlist.name === name) return playlist.id;
      }
      url = result.data?.next ?? null;
    }

    return null;
  }
}
