import * as readline from "node:readline/promises";
import type { BrowserLauncher } from "./browser-launcher";
import type { AppConfig } from "./config";
import { logger } from "./logger";
import {
  AuthorizationError,
  buildAuthorizeUrl,
  exchangeCodeForToken,
  type OAuthCredentials,
  parseResponseCode,
  refreshAccessToken
} from "./oauth";
import { SpotifyApiError, type AccountSessions, type AuthorizedAccounts, SpotifyClient } from "./spotify-client";
import { coversScope, isTokenExpired, readTokenCache, tokenCachePath, writeTokenCache } from "./token-cache";
import type { AccountGroup, SyncMode, TokenInfo } from "./types";

export const READ_SCOPE = "playlist-read-private user-library-read user-follow-read";
export const WRITE_SCOPE = [
  "playlist-modify-private playlist-modify-public user-library-modify user-follow-modify",
  READ_SCOPE
].join(" ");

export function scopeForGroup(group: AccountGroup): string {
  return group === "destinations" ? WRITE_SCOPE : READ_SCOPE;
}

export interface Prompt {
  ask(question: string): Promise<string>;
}

export function createConsolePrompt(): Prompt {
  return {
    async ask(question: string): Promise<string> {
      const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout
      });

      try {
        return await rl.question(question);
      } finally {
        rl.close();
      }
    }
  };
}

function printLoginInstructions(username: string, group: AccountGroup, scope: string): void {
  const loginType = group === "sources" ? "SOURCE" : "DESTINATION";
  console.log("");
  console.log("#####################################################");
  console.log(`Need to authenticate the Spotify user: ${username}`);
  console.log(`Login type: ${loginType}`);
  console.log("");
  console.log("SOURCE accounts are only read from (read-only access).");
  console.log("DESTINATION accounts receive the copied items (read/write access).");
  console.log("");
  console.log("Requested permissions:");
  for (const entry of scope.split(" ")) {
    console.log(`  ${entry}`);
  }
  console.log("");
  console.log("Log in to Spotify as this user in the browser window that opens.");
  console.log("After granting access you are redirected to another URL. Even if that page shows an");
  console.log("error, copy the full URL from the address bar and paste it here.");
  console.log("Close the browser window before pasting so the next login starts a fresh private session.");
  console.log("");
}

export interface AuthorizerOptions {
  browser: BrowserLauncher;
  prompt: Prompt;
}

export class Authorizer {
  private readonly credentials: OAuthCredentials;

  constructor(
    private readonly config: AppConfig,
    private readonly options: AuthorizerOptions
  ) {
    this.credentials = {
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      redirectUri: config.redirectUrl
    };
  }

  /**
   * Authorizes every configured account the mode needs. Read-only runs skip destinations and
   * write-only runs skip sources.
   */
  async authorizeAccounts(mode: SyncMode): Promise<AuthorizedAccounts> {
    this.assertCredentials();

    const accounts: AuthorizedAccounts = { sources: new Map(), destinations: new Map() };

    if (mode !== "write-only") {
      await this.authorizeGroup("sources", accounts.sources);
    }

    if (mode !== "read-only") {
      await this.authorizeGroup("destinations", accounts.destinations);
    }

    return accounts;
  }

  async authorizeAccount(username: string, group: AccountGroup): Promise<SpotifyClient> {
    this.assertCredentials();

    const scope = scopeForGroup(group);
    const cachePath = tokenCachePath(this.config.dataDir, username);
    const token = await this.resolveToken(username, group, scope, cachePath);

    return new SpotifyClient({ accessToken: token.access_token, scope });
  }

  private async authorizeGroup(group: AccountGroup, sessions: AccountSessions): Promise<void> {
    const settings = group === "sources" ? this.config.sources : this.config.destinations;

    for (const account of settings.values()) {
      logger.info(`Stage: authorizing ${group} account user=${account.username}.`);
      sessions.set(account.username, await this.authorizeAccount(account.username, group));
    }
  }

  private async resolveToken(
    username: string,
    group: AccountGroup,
    scope: string,
    cachePath: string
  ): Promise<TokenInfo> {
    const cached = await readTokenCache(cachePath);

    if (cached && coversScope(cached, scope)) {
      if (!isTokenExpired(cached)) {
        logger.info(`Using cached token for user=${username}.`);
        return cached;
      }

      if (cached.refresh_token) {
        const refreshed = await this.tryRefresh(username, cached);
        if (refreshed) {
          await writeTokenCache(cachePath, refreshed);
          return refreshed;
        }
      }
    }

    const token = await this.authorizeInteractively(username, group, scope);
    await writeTokenCache(cachePath, token);
    logger.info(`Saved token cache for user=${username} at ${cachePath}.`);

    return token;
  }

  private async tryRefresh(username: string, cached: TokenInfo): Promise<TokenInfo | null> {
    try {
      const refreshed = await refreshAccessToken(cached, this.credentials);
      logger.info(`Refreshed cached token for user=${username}.`);
      return refreshed;
    } catch (error) {
      // A revoked or invalid refresh token needs a new login; anything else is a real failure.
      if (error instanceof SpotifyApiError && error.status === 400) {
        logger.warn(`Refreshing the token for user=${username} was rejected: ${error.message}`);
        return null;
      }

      throw error;
    }
  }

  private async authorizeInteractively(username: string, group: AccountGroup, scope: string): Promise<TokenInfo> {
    printLoginInstructions(username, group, scope);

    const authUrl = buildAuthorizeUrl({
      clientId: this.credentials.clientId,
      redirectUri: this.credentials.redirectUri,
      scope
    });

    const opened = await this.options.browser.open(authUrl);
    if (opened) {
      console.log(`Opened ${authUrl} in your browser`);
    } else {
      console.log(`Please navigate here: ${authUrl}`);
    }

    console.log("");
    const response = await this.options.prompt.ask("Enter the URL you were redirected to: ");
    console.log("");

    const code = parseResponseCode(response);
    return exchangeCodeForToken(code, scope, this.credentials);
  }

  private assertCredentials(): void {
    const missing: string[] = [];
    if (!this.credentials.clientId) {
      missing.push("client_id (SPOTIFY_CLIENT_ID)");
    }
    if (!this.credentials.clientSecret) {
      missing.push("client_secret (SPOTIFY_CLIENT_SECRET)");
    }
    if (!this.credentials.redirectUri) {
      missing.push("redirect_url (SPOTIFY_REDIRECT_URI)");
    }

    if (missing.length > 0) {
      throw new AuthorizationError(
        [
          `Missing Spotify API credentials: ${missing.join(", ")}.`,
          "Set them in the config file or as environment variables.",
          "Get your credentials at https://developer.spotify.com/dashboard"
        ].join(" ")
      );
    }
  }
}
