// lib/sinks/dryRun.ts
import type { PlaylistSink } from "../types";

export interface DryRunPlaylist {
  id: string;
  name: string;
  description: string;
  trackIds: string[];
}

/**
 * Sink that writes nothing. Logs what it would do and keeps the playlists in
 * memory so a dry run can be inspected afterwards.
 */
export class DryRunPlaylistSink implements PlaylistSink {
  readonly playlists: DryRunPlaylist[] = [];

  async getOwnerId(): Promise<string> {
    return "dry-run";
  }

  async createPlaylist(
    _ownerId: string,
    name: string,
    description: string,
  ): Promise<string> {
    const id = `dry-run-${this.playlists.length + 1}`;
    this.playlists.push({ id, name, description, trackIds: [] });
    console.log(`[dry-run] Would create playlist "${name}": ${description}`);
    return id;
  }

  async addTracks(playlistId: string, trackIds: string[]): Promise<void> {
    const playlist = this.playlists.find((p) => p.id === playlistId);
    if (!playlist) {
      throw new Error(`Unknown dry-run playlist ${playlistId}`);
    }
    playlist.trackIds.push(...trackIds);
    console.log(`[dry-run] Would add ${trackIds.length} tracks to "${playlist.name}"`);
  }

  async findPlaylistByName(name: string): Promise<string | null> {
    return this.playlists.find((p) => p.name === name)?.id ?? null;
  }
}
