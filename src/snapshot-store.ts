import { promises as fs } from "node:fs";
import path from "node:path";
import type { PlaylistDescriptor, SnapshotContents, SnapshotName } from "./types";

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === "string");
}

function isPlaylistDescriptor(value: unknown): value is PlaylistDescriptor {
  if (typeof value !== "object" || value === null) {
    return false;
  }

  return (
    "id" in value &&
    typeof value.id === "string" &&
    "name" in value &&
    typeof value.name === "string" &&
    "ownerId" in value &&
    typeof value.ownerId === "string" &&
    "public" in value &&
    (typeof value.public === "boolean" || value.public === null) &&
    "trackUris" in value &&
    (value.trackUris === null || isStringArray(value.trackUris))
  );
}

function isPlaylistDescriptorArray(value: unknown): value is PlaylistDescriptor[] {
  return Array.isArray(value) && value.every(isPlaylistDescriptor);
}

const VALIDATORS: { [K in SnapshotName]: (value: unknown) => value is SnapshotContents[K] } = {
  tracks: isStringArray,
  artists: isStringArray,
  albums: isStringArray,
  playlists: isPlaylistDescriptorArray
};

export function snapshotPath(dataDir: string, name: SnapshotName): string {
  return path.join(dataDir, `${name}.p`);
}

export async function writeSnapshot<K extends SnapshotName>(
  dataDir: string,
  name: K,
  value: SnapshotContents[K]
): Promise<void> {
  await fs.mkdir(dataDir, { recursive: true });
  await fs.writeFile(snapshotPath(dataDir, name), `${JSON.stringify(value, null, 2)}\n`, "utf8");
}

/** Returns `null` when no snapshot of that name has been written yet. */
export async function readSnapshot<K extends SnapshotName>(
  dataDir: string,
  name: K
): Promise<SnapshotContents[K] | null> {
  const filePath = snapshotPath(dataDir, name);

  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }

    throw new Error(`Failed to read snapshot file (${filePath}): ${(error as Error).message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Snapshot file (${filePath}) is not valid JSON: ${(error as Error).message}`);
  }

  const isValid = VALIDATORS[name];
  if (!isValid(parsed)) {
    throw new Error(`Snapshot file (${filePath}) does not contain a valid ${name} list.`);
  }

  return parsed;
}
