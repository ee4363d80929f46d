import { collectFollowedArtists, collectPlaylists, collectSavedAlbums, collectSavedTracks } from "./collectors";
import { type AppConfig, sourceUsernames } from "./config";
import { logger } from "./logger";
import { readSnapshot, writeSnapshot } from "./snapshot-store";
import type { AuthorizedAccounts } from "./spotify-client";
import type {
  CollectedCounts,
  SnapshotContents,
  SnapshotName,
  SyncMode,
  SyncSummary,
  WrittenCounts
} from "./types";
import { writeFollowedArtists, writePlaylists, writeSavedAlbums, writeSavedTracks } from "./writers";

async function readPhase(accounts: AuthorizedAccounts, config: AppConfig): Promise<CollectedCounts> {
  const { sources } = accounts;

  logger.info(`Stage: collecting saved tracks from ${sources.size} source accounts.`);
  const tracks = await collectSavedTracks(sources, config.pageSize);

  logger.info("Stage: collecting followed artists.");
  const artists = await collectFollowedArtists(sources, config.pageSize);

  logger.info("Stage: collecting saved albums.");
  const albums = await collectSavedAlbums(sources, config.pageSize);

  logger.info("Stage: collecting playlists.");
  const playlists = await collectPlaylists(sources, config.pageSize, sourceUsernames(config));

  logger.info(`Stage: writing snapshots to ${config.dataDir}.`);
  await writeSnapshot(config.dataDir, "tracks", tracks);
  await writeSnapshot(config.dataDir, "artists", artists);
  await writeSnapshot(config.dataDir, "albums", albums);
  await writeSnapshot(config.dataDir, "playlists", playlists);

  return {
    tracks: tracks.length,
    artists: artists.length,
    albums: albums.length,
    playlists: playlists.length
  };
}

async function loadSnapshot<K extends SnapshotName>(dataDir: string, name: K): Promise<SnapshotContents[K] | []> {
  const snapshot = await readSnapshot(dataDir, name);
  if (snapshot === null) {
    logger.warn(`No ${name} snapshot found in ${dataDir}. Nothing to write for ${name}.`);
    return [];
  }

  return snapshot;
}

async function writePhase(accounts: AuthorizedAccounts, config: AppConfig): Promise<WrittenCounts> {
  const { destinations } = accounts;

  logger.info(`Stage: reading snapshots from ${config.dataDir}.`);
  const tracks = await loadSnapshot(config.dataDir, "tracks");
  const artists = await loadSnapshot(config.dataDir, "artists");
  const albums = await loadSnapshot(config.dataDir, "albums");
  const playlists = await loadSnapshot(config.dataDir, "playlists");

  logger.info(`Stage: saving tracks to ${destinations.size} destination accounts.`);
  const savedTracks = await writeSavedTracks(destinations, tracks);

  logger.info("Stage: following artists.");
  const followedArtists = await writeFollowedArtists(destinations, artists);

  logger.info("Stage: saving albums.");
  const savedAlbums = await writeSavedAlbums(destinations, albums);

  logger.info("Stage: transferring playlists.");
  const playlistResult = await writePlaylists(destinations, playlists, sourceUsernames(config));

  return {
    savedTracks,
    followedArtists,
    savedAlbums,
    followedPlaylists: playlistResult.followedPlaylists,
    copiedPlaylists: playlistResult.copiedPlaylists
  };
}

export async function runSync(accounts: AuthorizedAccounts, config: AppConfig, mode: SyncMode): Promise<SyncSummary> {
  const collected = mode === "write-only" ? null : await readPhase(accounts, config);
  const written = mode === "read-only" ? null : await writePhase(accounts, config);

  return { mode, collected, written };
}

export function formatSummary(summary: SyncSummary): string {
  const parts = ["Sync complete.", `mode=${summary.mode}`];

  if (summary.collected) {
    parts.push(
      `collectedTracks=${summary.collected.tracks}`,
      `collectedArtists=${summary.collected.artists}`,
      `collectedAlbums=${summary.collected.albums}`,
      `collectedPlaylists=${summary.collected.playlists}`
    );
  }

  if (summary.written) {
    parts.push(
      `savedTracks=${summary.written.savedTracks}`,
      `followedArtists=${summary.written.followedArtists}`,
      `savedAlbums=${summary.written.savedAlbums}`,
      `followedPlaylists=${summary.written.followedPlaylists}`,
      `copiedPlaylists=${summary.written.copiedPlaylists}`
    );
  }

  return parts.join(" ");
}
