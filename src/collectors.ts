import { logger } from "./logger";
import {
  collectPages,
  FIRST_AFTER_PAGE,
  FIRST_OFFSET_PAGE,
  nextAfterCursor,
  nextOffsetCursor
} from "./pagination";
import type { AccountSessions, SpotifyClient } from "./spotify-client";
import type { PlaylistDescriptor, PlaylistItem, SimplifiedPlaylist, SpotifyTrack } from "./types";

export const PLAYLIST_ITEMS_PAGE_SIZE = 100;

function isCopyableTrack(track: SpotifyTrack | null): track is SpotifyTrack & { id: string } {
  return track !== null && track.id !== null && track.is_local !== true;
}

export async function collectSavedTracks(sources: AccountSessions, pageSize: number): Promise<string[]> {
  const trackIds: string[] = [];

  for (const [username, session] of sources) {
    let skippedCount = 0;
    const ids = await collectPages(FIRST_OFFSET_PAGE, async (cursor) => {
      const page = await session.getSavedTracks(cursor.offset, pageSize);
      logger.info(`Fetched saved tracks page user=${username} offset=${cursor.offset} items=${page.items.length}`);

      const pageIds: string[] = [];
      for (const item of page.items) {
        if (isCopyableTrack(item.track)) {
          pageIds.push(item.track.id);
        } else {
          skippedCount += 1;
        }
      }

      return { items: pageIds, next: nextOffsetCursor(cursor, pageSize, page) };
    });

    if (skippedCount > 0) {
      logger.warn(`Skipped ${skippedCount} saved tracks without a Spotify ID for user=${username}.`);
    }

    logger.info(`Collected ${ids.length} saved tracks from user=${username}.`);
    trackIds.push(...ids);
  }

  return trackIds;
}

export async function collectFollowedArtists(sources: AccountSessions, pageSize: number): Promise<string[]> {
  const artistIds: string[] = [];

  for (const [username, session] of sources) {
    const ids = await collectPages(FIRST_AFTER_PAGE, async (cursor) => {
      const { artists } = await session.getFollowedArtists(cursor.after, pageSize);
      logger.info(
        `Fetched followed artists page user=${username} after=${cursor.after ?? "-"} items=${artists.items.length}`
      );

      return { items: artists.items.map((artist) => artist.id), next: nextAfterCursor(artists) };
    });

    logger.info(`Collected ${ids.length} followed artists from user=${username}.`);
    artistIds.push(...ids);
  }

  return artistIds;
}

export async function collectSavedAlbums(sources: AccountSessions, pageSize: number): Promise<string[]> {
  const albumIds: string[] = [];

  for (const [username, session] of sources) {
    let skippedCount = 0;
    const ids = await collectPages(FIRST_OFFSET_PAGE, async (cursor) => {
      const page = await session.getSavedAlbums(cursor.offset, pageSize);
      logger.info(`Fetched saved albums page user=${username} offset=${cursor.offset} items=${page.items.length}`);

      const pageIds: string[] = [];
      for (const item of page.items) {
        if (item.album) {
          pageIds.push(item.album.id);
        } else {
          skippedCount += 1;
        }
      }

      return { items: pageIds, next: nextOffsetCursor(cursor, pageSize, page) };
    });

    if (skippedCount > 0) {
      logger.warn(`Skipped ${skippedCount} unavailable saved albums for user=${username}.`);
    }

    logger.info(`Collected ${ids.length} saved albums from user=${username}.`);
    albumIds.push(...ids);
  }

  return albumIds;
}

export async function collectPlaylistTrackUris(session: SpotifyClient, playlistId: string): Promise<string[]> {
  const items = await collectPages(FIRST_OFFSET_PAGE, async (cursor) => {
    const page = await session.getPlaylistItems(playlistId, cursor.offset, PLAYLIST_ITEMS_PAGE_SIZE);
    return {
      items: page.items,
      next: nextOffsetCursor(cursor, PLAYLIST_ITEMS_PAGE_SIZE, page)
    };
  });

  return items
    .map((item: PlaylistItem) => item.track)
    .filter(isCopyableTrack)
    .map((track) => track.uri);
}

/**
 * Lists every playlist the source accounts own or follow. Playlists owned by one of
 * `sourceUsernames` carry their full track list so they can be recreated without
 * reading the source again.
 */
export async function collectPlaylists(
  sources: AccountSessions,
  pageSize: number,
  sourceUsernames: ReadonlySet<string>
): Promise<PlaylistDescriptor[]> {
  const playlists: PlaylistDescriptor[] = [];

  for (const [username, session] of sources) {
    const listed = await collectPages(FIRST_OFFSET_PAGE, async (cursor) => {
      const page = await session.getCurrentUserPlaylists(cursor.offset, pageSize);
      logger.info(`Fetched playlists page user=${username} offset=${cursor.offset} items=${page.items.length}`);

      return {
        items: page.items.filter((playlist): playlist is SimplifiedPlaylist => playlist !== null),
        next: nextOffsetCursor(cursor, pageSize, page)
      };
    });

    for (const playlist of listed) {
      const owned = sourceUsernames.has(playlist.owner.id);
      const trackUris = owned ? await collectPlaylistTrackUris(session, playlist.id) : null;

      playlists.push({
        id: playlist.id,
        name: playlist.name,
        ownerId: playlist.owner.id,
        public: playlist.public,
        trackUris
      });
    }

    logger.info(`Collected ${listed.length} playlists from user=${username}.`);
  }

  return playlists;
}
