/**
 * token.ts
 *
 * Spotify access tokens from a long-lived refresh token.
 * The token is cached until shortly before it expires; concurrent callers
 * share one in-flight refresh.
 */

import type { SpotifyCredentials } from "../config";
import type { TokenProvider } from "../types";

const SPOTIFY_TOKEN_URL = "https://accounts.spotify.com/api/token";
const EXPIRY_MARGIN_MS = 60_000;

interface RefreshTokenResponse {
  access_token?: string;
  expires_in?: number;
}

export interface SpotifyTokenProviderOptions {
  fetchImpl?: typeof fetch;
  now?: () => number;
  timeoutMs?: number;
}

export class SpotifyTokenProvider implements TokenProvider {
  private token: { value: string; expiresAt: number } | null = null;
  private pending: Promise<string> | null = null;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private readonly timeoutMs: number;

  constructor(
    private readonly credentials: SpotifyCredentials,
    options: SpotifyTokenProviderOptions = {},
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  async getAccessToken(): Promise<string> {
    if (this.token && this.now() < this.token.expiresAt - EXPIRY_MARGIN_MS) {
      return this.token.value;
    }
    if (!this.pending) {
      this.pending = this.refresh().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  invalidate(): void {
    this.token = null;
  }

  private async refresh(): Promise<string> {
    console.log("[spotify] Refreshing access token");

    const basic = Buffer.from(
      `${this.credentials.clientId}:${this.credentials.clientSecret}`,
    ).toString("base64");

    const response = await this.fetchImpl(SPOTIFY_TOKEN_URL, {
      method: "POST",
      headers: {
        Authorization: `Basic ${basic}`,
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: new URLSearchParams({
        grant_type: "refresh_token",
        refresh_token: this.credentials.refreshToken,
      }).toString(),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Spotify token refresh failed: HTTP ${response.status}`);
    }

    const data = (await response.json()) as RefreshTokenResponse;
    if (!data.access_token) {
      throw new Error("Spotify token refresh returned no access_token");
    }

    this.token = {
      value: data.access_token,
      expiresAt: this.now() + (data.expires_in ?? 3600) * 1000,
    };
    return data.access_token;
  }
}
