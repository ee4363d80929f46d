import { logger } from "./logger";
import type { AccountSessions } from "./spotify-client";
import type { PlaylistDescriptor } from "./types";

export const PLAYLIST_WRITE_BATCH_SIZE = 100;

export function chunk<T>(items: T[], size: number): T[][] {
  const result: T[][] = [];

  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }

  return result;
}

export async function writeSavedTracks(destinations: AccountSessions, trackIds: string[]): Promise<number> {
  let calls = 0;

  for (const [username, session] of destinations) {
    logger.info(`Saving ${trackIds.length} tracks for user=${username}.`);
    for (const trackId of trackIds) {
      await session.saveTracks([trackId]);
      calls += 1;
    }
  }

  return calls;
}

export async function writeFollowedArtists(destinations: AccountSessions, artistIds: string[]): Promise<number> {
  let calls = 0;

  for (const [username, session] of destinations) {
    logger.info(`Following ${artistIds.length} artists for user=${username}.`);
    for (const artistId of artistIds) {
      await session.followArtists([artistId]);
      calls += 1;
    }
  }

  return calls;
}

export async function writeSavedAlbums(destinations: AccountSessions, albumIds: string[]): Promise<number> {
  let calls = 0;

  for (const [username, session] of destinations) {
    logger.info(`Saving ${albumIds.length} albums for user=${username}.`);
    for (const albumId of albumIds) {
      await session.saveAlbums([albumId]);
      calls += 1;
    }
  }

  return calls;
}

export interface PlaylistWriteResult {
  followedPlaylists: number;
  copiedPlaylists: number;
}

/**
 * Playlists owned by a configured source are recreated under each destination user with the
 * same name and visibility; every other playlist is only followed. An owned playlist whose
 * tracks were not captured by the read phase is followed as well.
 */
export async function writePlaylists(
  destinations: AccountSessions,
  playlists: PlaylistDescriptor[],
  sourceUsernames: ReadonlySet<string>
): Promise<PlaylistWriteResult> {
  const result: PlaylistWriteResult = { followedPlaylists: 0, copiedPlaylists: 0 };

  for (const [username, session] of destinations) {
    for (const playlist of playlists) {
      if (sourceUsernames.has(playlist.ownerId) && playlist.trackUris === null) {
        logger.warn(
          `Playlist "${playlist.name}" (${playlist.id}) belongs to source user=${playlist.ownerId} but its tracks ` +
            "were not captured in the last read. Following it instead of copying; run a read again to copy it."
        );
      }

      if (playlist.trackUris === null || !sourceUsernames.has(playlist.ownerId)) {
        logger.info(`Following playlist "${playlist.name}" (${playlist.id}) for user=${username}.`);
        await session.followPlaylist(playlist.id);
        result.followedPlaylists += 1;
        continue;
      }

      const { trackUris } = playlist;
      const newPlaylistId = await session.createPlaylist(playlist.name, playlist.public);
      logger.info(
        `Created playlist "${playlist.name}" (${newPlaylistId}) for user=${username} tracks=${trackUris.length}.`
      );

      for (const uriChunk of chunk(trackUris, PLAYLIST_WRITE_BATCH_SIZE)) {
        await session.addPlaylistItems(newPlaylistId, uriChunk);
      }

      result.copiedPlaylists += 1;
    }
  }

  return result;
}
