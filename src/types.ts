export interface SpotifyUser {
  id: string;
  display_name: string | null;
}

export interface SpotifyTrack {
  id: string | null;
  uri: string;
  is_local?: boolean;
}

export interface SavedTrackItem {
  added_at: string;
  track: SpotifyTrack | null;
}

export interface SavedAlbumItem {
  added_at: string;
  album: { id: string; name: string } | null;
}

export interface SpotifyArtist {
  id: string;
  name: string;
}

export interface PlaylistItem {
  track: SpotifyTrack | null;
}

export interface SimplifiedPlaylist {
  id: string;
  name: string;
  public: boolean | null;
  owner: { id: string; display_name?: string | null };
}

export interface PagingResponse<T> {
  items: T[];
  limit: number;
  offset: number;
  total: number;
  next: string | null;
}

export interface CursorPagingResponse<T> {
  items: T[];
  limit: number;
  next: string | null;
  cursors: { after: string | null } | null;
  total?: number;
}

export interface FollowedArtistsResponse {
  artists: CursorPagingResponse<SpotifyArtist>;
}

export interface TokenInfo {
  access_token: string;
  token_type: string;
  expires_in: number;
  refresh_token: string | null;
  scope: string;
  /** Epoch seconds. */
  expires_at: number;
}

export interface PlaylistDescriptor {
  id: string;
  name: string;
  ownerId: string;
  public: boolean | null;
  /** Full track list for playlists owned by a configured source, `null` for foreign ones. */
  trackUris: string[] | null;
}

export interface SnapshotContents {
  tracks: string[];
  artists: string[];
  albums: string[];
  playlists: PlaylistDescriptor[];
}

export type SnapshotName = keyof SnapshotContents;

export type AccountGroup = "sources" | "destinations";

export type SyncMode = "full" | "read-only" | "write-only";

export interface CollectedCounts {
  tracks: number;
  artists: number;
  albums: number;
  playlists: number;
}

export interface WrittenCounts {
  savedTracks: number;
  followedArtists: number;
  savedAlbums: number;
  followedPlaylists: number;
  copiedPlaylists: number;
}

export interface SyncSummary {
  mode: SyncMode;
  collected: CollectedCounts | null;
  written: WrittenCounts | null;
}
