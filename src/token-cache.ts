import { promises as fs } from "node:fs";
import path from "node:path";
import { logger } from "./logger";
import type { TokenInfo } from "./types";

/** Seconds before expiry at which a cached token is already treated as expired. */
export const EXPIRY_MARGIN_SECONDS = 60;

export function tokenCachePath(dataDir: string, username: string): string {
  return path.join(dataDir, username, `.cache-${username}`);
}

function isTokenInfo(value: unknown): value is TokenInfo {
  if (typeof value !== "object" || value === null) {
    return false;
  }

  return (
    "access_token" in value &&
    typeof value.access_token === "string" &&
    "token_type" in value &&
    typeof value.token_type === "string" &&
    "expires_in" in value &&
    typeof value.expires_in === "number" &&
    "refresh_token" in value &&
    (typeof value.refresh_token === "string" || value.refresh_token === null) &&
    "scope" in value &&
    typeof value.scope === "string" &&
    "expires_at" in value &&
    typeof value.expires_at === "number"
  );
}

/** Returns `null` when there is no cache file or it cannot be used. */
export async function readTokenCache(cachePath: string): Promise<TokenInfo | null> {
  let raw: string;
  try {
    raw = await fs.readFile(cachePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }

    throw new Error(`Failed to read token cache (${cachePath}): ${(error as Error).message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn(`Ignoring unreadable token cache (${cachePath}): ${(error as Error).message}`);
    return null;
  }

  if (!isTokenInfo(parsed)) {
    logger.warn(`Ignoring token cache with unexpected contents (${cachePath}).`);
    return null;
  }

  return parsed;
}

export async function writeTokenCache(cachePath: string, token: TokenInfo): Promise<void> {
  await fs.mkdir(path.dirname(cachePath), { recursive: true });
  await fs.writeFile(cachePath, `${JSON.stringify(token, null, 2)}\n`, { encoding: "utf8", mode: 0o600 });
}

export function isTokenExpired(token: TokenInfo, nowSeconds: number = Math.floor(Date.now() / 1000)): boolean {
  return token.expires_at - nowSeconds < EXPIRY_MARGIN_SECONDS;
}

export function coversScope(token: TokenInfo, requestedScope: string): boolean {
  const granted = new Set(token.scope.split(/\s+/).filter(Boolean));
  return requestedScope
    .split(/\s+/)
    .filter(Boolean)
    .every((scope) => granted.has(scope));
}
