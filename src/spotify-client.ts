import { logger } from "./logger";
import type {
  FollowedArtistsResponse,
  PagingResponse,
  PlaylistItem,
  SavedAlbumItem,
  SavedTrackItem,
  SimplifiedPlaylist,
  SpotifyUser
} from "./types";

export const SPOTIFY_API_BASE = "https://api.spotify.com/v1";
export const REQUEST_TIMEOUT_MS = 30000;

export function buildErrorMessage(status: number, bodyText: string): string {
  if (!bodyText) {
    return `Spotify API request failed with status ${status}`;
  }

  try {
    const parsed = JSON.parse(bodyText) as {
      error?: { message?: string } | string;
      error_description?: string;
      message?: string;
    };

    if (typeof parsed.error === "string") {
      const detail = parsed.error_description ? `${parsed.error} (${parsed.error_description})` : parsed.error;
      return `Spotify API request failed with status ${status}: ${detail}`;
    }

    const errorMessage = parsed.error?.message || parsed.message;
    if (errorMessage) {
      return `Spotify API request failed with status ${status}: ${errorMessage}`;
    }
  } catch {
    // Not JSON, the plain body is used below.
  }

  return `Spotify API request failed with status ${status}: ${bodyText}`;
}

export class SpotifyApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "SpotifyApiError";
    this.status = status;
  }
}

/**
 * Runs `fetch` with the shared request timeout and returns the body text.
 * Non-2xx responses raise {@link SpotifyApiError}.
 */
export async function fetchText(url: string, init: RequestInit): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

  let response: Response;
  try {
    response = await fetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      throw new Error(`Spotify request timed out after ${REQUEST_TIMEOUT_MS}ms: ${init.method || "GET"} ${url}`);
    }

    throw error;
  } finally {
    clearTimeout(timeoutId);
  }

  const bodyText = await response.text();
  if (!response.ok) {
    throw new SpotifyApiError(response.status, buildErrorMessage(response.status, bodyText));
  }

  return bodyText;
}

interface RequestOptions {
  method?: "GET" | "POST" | "PUT";
  body?: unknown;
}

export interface SpotifySessionOptions {
  accessToken: string;
  scope: string;
}

/**
 * A Web API session for one authorized account. Every call runs once; failures surface as
 * {@link SpotifyApiError} without retrying.
 */
export class SpotifyClient {
  readonly scope: string;
  private readonly accessToken: string;

  constructor(options: SpotifySessionOptions) {
    this.accessToken = options.accessToken;
    this.scope = options.scope;
  }

  async getCurrentUser(): Promise<SpotifyUser> {
    return this.request<SpotifyUser>("/me");
  }

  async getSavedTracks(offset: number, limit: number): Promise<PagingResponse<SavedTrackItem>> {
    return this.request<PagingResponse<SavedTrackItem>>(`/me/tracks?limit=${limit}&offset=${offset}`);
  }

  async getFollowedArtists(after: string | null, limit: number): Promise<FollowedArtistsResponse> {
    const query = new URLSearchParams({ type: "artist", limit: String(limit) });
    if (after !== null) {
      query.set("after", after);
    }

    return this.request<FollowedArtistsResponse>(`/me/following?${query.toString()}`);
  }

  async getSavedAlbums(offset: number, limit: number): Promise<PagingResponse<SavedAlbumItem>> {
    return this.request<PagingResponse<SavedAlbumItem>>(`/me/albums?limit=${limit}&offset=${offset}`);
  }

  /** Spotify lists playlists that were deleted or made unavailable as `null`. */
  async getCurrentUserPlaylists(offset: number, limit: number): Promise<PagingResponse<SimplifiedPlaylist | null>> {
    return this.request<PagingResponse<SimplifiedPlaylist | null>>(`/me/playlists?limit=${limit}&offset=${offset}`);
  }

  async getPlaylistItems(playlistId: string, offset: number, limit: number): Promise<PagingResponse<PlaylistItem>> {
    return this.request<PagingResponse<PlaylistItem>>(
      `/playlists/${encodeURIComponent(playlistId)}/items?limit=${limit}&offset=${offset}`
    );
  }

  async saveTracks(ids: string[]): Promise<void> {
    await this.send("/me/tracks", { method: "PUT", body: { ids } });
  }

  async followArtists(ids: string[]): Promise<void> {
    await this.send("/me/following?type=artist", { method: "PUT", body: { ids } });
  }

  async saveAlbums(ids: string[]): Promise<void> {
    await this.send("/me/albums", { method: "PUT", body: { ids } });
  }

  async followPlaylist(playlistId: string): Promise<void> {
    await this.send(`/playlists/${encodeURIComponent(playlistId)}/followers`, {
      method: "PUT",
      body: { public: true }
    });
  }

  async createPlaylist(name: string, isPublic: boolean | null): Promise<string> {
    const payload: { name: string; public?: boolean } = { name };
    if (isPublic !== null) {
      payload.public = isPublic;
    }

    const response = await this.request<{ id: string }>("/me/playlists", {
      method: "POST",
      body: payload
    });

    return response.id;
  }

  async addPlaylistItems(playlistId: string, uris: string[]): Promise<void> {
    await this.send(`/playlists/${encodeURIComponent(playlistId)}/items`, {
      method: "POST",
      body: { uris }
    });
  }

  private async request<T>(path: string, options: RequestOptions = {}): Promise<T> {
    const bodyText = await this.send(path, options);
    if (!bodyText) {
      throw new Error(`Spotify API returned an empty body for ${options.method || "GET"} ${path}`);
    }

    return JSON.parse(bodyText) as T;
  }

  private async send(path: string, options: RequestOptions): Promise<string> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      Authorization: `Bearer ${this.accessToken}`
    };

    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    const method = options.method || "GET";
    logger.debug(`Spotify request: ${method} ${path}`);

    return fetchText(`${SPOTIFY_API_BASE}${path}`, {
      method,
      headers,
      body: options.body !== undefined ? JSON.stringify(options.body) : undefined
    });
  }
}

/** Authorized sessions keyed by username, in configuration order. */
export type AccountSessions = Map<string, SpotifyClient>;

export interface AuthorizedAccounts {
  sources: AccountSessions;
  destinations: AccountSessions;
}
