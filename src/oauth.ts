import { logger } from "./logger";
import { fetchText } from "./spotify-client";
import type { TokenInfo } from "./types";

export const SPOTIFY_ACCOUNTS_BASE = "https://accounts.spotify.com";

export class AuthorizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthorizationError";
  }
}

export interface OAuthCredentials {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

interface TokenResponse {
  access_token?: string;
  token_type?: string;
  expires_in?: number;
  refresh_token?: string;
  scope?: string;
}

export function buildAuthorizeUrl(params: {
  clientId: string;
  redirectUri: string;
  scope: string;
  state?: string;
}): string {
  const query = new URLSearchParams({
    client_id: params.clientId,
    response_type: "code",
    redirect_uri: params.redirectUri,
    scope: params.scope,
    show_dialog: "true"
  });

  if (params.state) {
    query.set("state", params.state);
  }

  return `${SPOTIFY_ACCOUNTS_BASE}/authorize?${query.toString()}`;
}

/**
 * Extracts the authorization code from the URL the browser was redirected to. Input that is not
 * a URL is taken to be the code itself.
 */
export function parseResponseCode(response: string): string {
  const trimmed = response.trim();
  if (!trimmed) {
    throw new AuthorizationError("No redirect URL was entered.");
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return trimmed;
  }

  const error = url.searchParams.get("error");
  if (error) {
    throw new AuthorizationError(`Spotify authorization failed: ${error}`);
  }

  const code = url.searchParams.get("code");
  if (!code) {
    throw new AuthorizationError(`The redirect URL does not contain an authorization code: ${trimmed}`);
  }

  return code;
}

function toTokenInfo(response: TokenResponse, fallback: { scope: string; refreshToken: string | null }): TokenInfo {
  if (!response.access_token) {
    throw new Error("Spotify token response did not include access_token");
  }

  const expiresIn = response.expires_in ?? 3600;
  return {
    access_token: response.access_token,
    token_type: response.token_type ?? "Bearer",
    expires_in: expiresIn,
    refresh_token: response.refresh_token ?? fallback.refreshToken,
    scope: response.scope ?? fallback.scope,
    expires_at: Math.floor(Date.now() / 1000) + expiresIn
  };
}

async function requestToken(params: URLSearchParams, credentials: OAuthCredentials): Promise<TokenResponse> {
  params.set("client_id", credentials.clientId);
  params.set("client_secret", credentials.clientSecret);

  const bodyText = await fetchText(`${SPOTIFY_ACCOUNTS_BASE}/api/token`, {
    method: "POST",
    headers: {
      "Content-Type": "application/x-www-form-urlencoded"
    },
    body: params
  });

  return JSON.parse(bodyText) as TokenResponse;
}

export async function exchangeCodeForToken(
  code: string,
  scope: string,
  credentials: OAuthCredentials
): Promise<TokenInfo> {
  logger.debug("Exchanging authorization code for an access token.");
  const response = await requestToken(
    new URLSearchParams({
      grant_type: "authorization_code",
      code,
      redirect_uri: credentials.redirectUri
    }),
    credentials
  );

  return toTokenInfo(response, { scope, refreshToken: null });
}

/** Spotify may omit the refresh token on refresh; the previous one stays valid then. */
export async function refreshAccessToken(token: TokenInfo, credentials: OAuthCredentials): Promise<TokenInfo> {
  if (!token.refresh_token) {
    throw new AuthorizationError("The cached token has no refresh token.");
  }

  logger.debug("Refreshing cached access token.");
  const response = await requestToken(
    new URLSearchParams({
      grant_type: "refresh_token",
      refresh_token: token.refresh_token
    }),
    credentials
  );

  return toTokenInfo(response, { scope: token.scope, refreshToken: token.refresh_token });
}
