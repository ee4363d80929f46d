import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { Authorizer, type Prompt, READ_SCOPE, scopeForGroup, WRITE_SCOPE } from "../src/auth";
import type { BrowserLauncher } from "../src/browser-launcher";
import type { AppConfig } from "../src/config";
import { AuthorizationError, buildAuthorizeUrl, parseResponseCode } from "../src/oauth";
import { readTokenCache, tokenCachePath, writeTokenCache } from "../src/token-cache";
import type { TokenInfo } from "../src/types";
import { jsonResponse, notFound, stubFetch } from "./helpers/fake-fetch";

const REDIRECT_URL = "http://127.0.0.1:8888/callback";

function testConfig(dataDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    clientId: "test-client-id",
    clientSecret: "test-secret",
    redirectUrl: REDIRECT_URL,
    dataDir,
    pageSize: 20,
    browser: { name: "none", private: true },
    sources: new Map([["first", { username: "alice" }]]),
    destinations: new Map([["second", { username: "bob" }]]),
    ...overrides
  };
}

function cachedToken(overrides: Partial<TokenInfo> = {}): TokenInfo {
  return {
    access_token: "cached-access",
    token_type: "Bearer",
    expires_in: 3600,
    refresh_token: "cached-refresh",
    scope: READ_SCOPE,
    expires_at: Math.floor(Date.now() / 1000) + 3600,
    ...overrides
  };
}

describe("scopes", () => {
  it("gives sources read access and destinations read and write access", () => {
    expect(scopeForGroup("sources")).toBe("playlist-read-private user-library-read user-follow-read");
    expect(scopeForGroup("destinations")).toBe(
      "playlist-modify-private playlist-modify-public user-library-modify user-follow-modify playlist-read-private user-library-read user-follow-read"
    );
  });
});

describe("buildAuthorizeUrl", () => {
  it("asks for an authorization code with the requested scope", () => {
    const url = new URL(buildAuthorizeUrl({ clientId: "test-client-id", redirectUri: REDIRECT_URL, scope: READ_SCOPE }));

    expect(url.origin + url.pathname).toBe("https://accounts.spotify.com/authorize");
    expect(url.searchParams.get("client_id")).toBe("test-client-id");
    expect(url.searchParams.get("response_type")).toBe("code");
    expect(url.searchParams.get("redirect_uri")).toBe(REDIRECT_URL);
    expect(url.searchParams.get("scope")).toBe(READ_SCOPE);
    expect(url.searchParams.get("show_dialog")).toBe("true");
  });
});

describe("parseResponseCode", () => {
  it("extracts the code from the redirect URL", () => {
    expect(parseResponseCode(`  ${REDIRECT_URL}?code=abc123&state=xyz \n`)).toBe("abc123");
  });

  it("accepts a bare code", () => {
    expect(parseResponseCode("abc123")).toBe("abc123");
  });

  it("raises the provider's error", () => {
    expect(() => parseResponseCode(`${REDIRECT_URL}?error=access_denied`)).toThrow(
      new AuthorizationError("Spotify authorization failed: access_denied")
    );
  });

  it("rejects empty input and URLs without a code", () => {
    expect(() => parseResponseCode("   ")).toThrow(AuthorizationError);
    expect(() => parseResponseCode(REDIRECT_URL)).toThrow(AuthorizationError);
  });
});

describe("Authorizer", () => {
  let dataDir: string;
  let browser: BrowserLauncher & { open: Mock<(url: string) => Promise<boolean>> };
  let prompt: Prompt & { ask: Mock<(question: string) => Promise<string>> };

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "library-sync-auth-"));
    browser = { open: vi.fn(async (_url: string) => true) };
    prompt = { ask: vi.fn(async (_question: string) => "") };
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  function stubTokenEndpoint() {
    return stubFetch((call) => {
      if (call.host === "accounts.spotify.com" && call.path === "/api/token") {
        const body = call.body;
        const code = typeof body === "object" && body !== null && "code" in body ? String(body.code) : "";
        return { access_token: `access-${code}`, token_type: "Bearer", expires_in: 3600, refresh_token: `refresh-${code}` };
      }

      if (call.path === "/v1/me") {
        return { id: "someone", display_name: null };
      }

      return notFound(call);
    });
  }

  it("logs every account in interactively with its group's scope and caches the tokens", async () => {
    const calls = stubTokenEndpoint();
    prompt.ask
      .mockResolvedValueOnce(`${REDIRECT_URL}?code=code-alice`)
      .mockResolvedValueOnce(`${REDIRECT_URL}?code=code-bob`);

    const accounts = await new Authorizer(testConfig(dataDir), { browser, prompt }).authorizeAccounts("full");

    expect([...accounts.sources.keys()]).toEqual(["alice"]);
    expect([...accounts.destinations.keys()]).toEqual(["bob"]);
    expect(accounts.sources.get("alice")?.scope).toBe(READ_SCOPE);
    expect(accounts.destinations.get("bob")?.scope).toBe(WRITE_SCOPE);

    const openedScopes = browser.open.mock.calls.map(([url]) => new URL(url).searchParams.get("scope"));
    expect(openedScopes).toEqual([READ_SCOPE, WRITE_SCOPE]);

    const tokenRequests = calls.filter((call) => call.path === "/api/token");
    expect(tokenRequests.map((call) => call.body)).toEqual([
      {
        grant_type: "authorization_code",
        code: "code-alice",
        redirect_uri: REDIRECT_URL,
        client_id: "test-client-id",
        client_secret: "test-secret"
      },
      {
        grant_type: "authorization_code",
        code: "code-bob",
        redirect_uri: REDIRECT_URL,
        client_id: "test-client-id",
        client_secret: "test-secret"
      }
    ]);

    const aliceCache = await readTokenCache(path.join(dataDir, "alice", ".cache-alice"));
    expect(aliceCache).toMatchObject({ access_token: "access-code-alice", refresh_token: "refresh-code-alice", scope: READ_SCOPE });
    const bobCache = await readTokenCache(tokenCachePath(dataDir, "bob"));
    expect(bobCache).toMatchObject({ access_token: "access-code-bob", scope: WRITE_SCOPE });

    await accounts.sources.get("alice")?.getCurrentUser();
    expect(calls[calls.length - 1].authorization).toBe("Bearer access-code-alice");
  });

  it("authorizes only the sources in read-only mode and only the destinations in write-only mode", async () => {
    stubTokenEndpoint();
    prompt.ask.mockResolvedValue(`${REDIRECT_URL}?code=any`);
    const authorizer = new Authorizer(testConfig(dataDir), { browser, prompt });

    const readOnly = await authorizer.authorizeAccounts("read-only");
    expect([...readOnly.sources.keys()]).toEqual(["alice"]);
    expect(readOnly.destinations.size).toBe(0);

    const writeOnly = await authorizer.authorizeAccounts("write-only");
    expect(writeOnly.sources.size).toBe(0);
    expect([...writeOnly.destinations.keys()]).toEqual(["bob"]);
  });

  it("reuses a valid cached token without prompting", async () => {
    const calls = stubTokenEndpoint();
    await writeTokenCache(tokenCachePath(dataDir, "alice"), cachedToken());

    const session = await new Authorizer(testConfig(dataDir), { browser, prompt }).authorizeAccount("alice", "sources");

    await session.getCurrentUser();
    expect(prompt.ask).not.toHaveBeenCalled();
    expect(browser.open).not.toHaveBeenCalled();
    expect(calls.map((call) => call.path)).toEqual(["/v1/me"]);
    expect(calls[0].authorization).toBe("Bearer cached-access");
  });

  it("logs in again when the cached token lacks the requested scope", async () => {
    stubTokenEndpoint();
    await writeTokenCache(tokenCachePath(dataDir, "bob"), cachedToken({ scope: READ_SCOPE }));
    prompt.ask.mockResolvedValue(`${REDIRECT_URL}?code=code-bob`);

    await new Authorizer(testConfig(dataDir), { browser, prompt }).authorizeAccount("bob", "destinations");

    expect(prompt.ask).toHaveBeenCalledTimes(1);
    expect(await readTokenCache(tokenCachePath(dataDir, "bob"))).toMatchObject({ scope: WRITE_SCOPE });
  });

  it("refreshes an expired token and keeps the old refresh token", async () => {
    const calls = stubFetch(() => ({ access_token: "refreshed-access", token_type: "Bearer", expires_in: 3600 }));
    await writeTokenCache(
      tokenCachePath(dataDir, "alice"),
      cachedToken({ expires_at: Math.floor(Date.now() / 1000) - 10 })
    );

    await new Authorizer(testConfig(dataDir), { browser, prompt }).authorizeAccount("alice", "sources");

    expect(prompt.ask).not.toHaveBeenCalled();
    expect(calls[0].body).toEqual({
      grant_type: "refresh_token",
      refresh_token: "cached-refresh",
      client_id: "test-client-id",
      client_secret: "test-secret"
    });
    expect(await readTokenCache(tokenCachePath(dataDir, "alice"))).toMatchObject({
      access_token: "refreshed-access",
      refresh_token: "cached-refresh",
      scope: READ_SCOPE
    });
  });

  it("falls back to an interactive login when the refresh token is rejected", async () => {
    stubFetch((call) => {
      const body = call.body;
      const grant = typeof body === "object" && body !== null && "grant_type" in body ? body.grant_type : null;
      if (grant === "refresh_token") {
        return jsonResponse(400, { error: "invalid_grant", error_description: "Refresh token revoked" });
      }

      return { access_token: "fresh-access", token_type: "Bearer", expires_in: 3600, refresh_token: "fresh-refresh" };
    });
    await writeTokenCache(tokenCachePath(dataDir, "alice"), cachedToken({ expires_at: 0 }));
    prompt.ask.mockResolvedValue(`${REDIRECT_URL}?code=code-alice`);

    await new Authorizer(testConfig(dataDir), { browser, prompt }).authorizeAccount("alice", "sources");

    expect(prompt.ask).toHaveBeenCalledTimes(1);
    expect(await readTokenCache(tokenCachePath(dataDir, "alice"))).toMatchObject({ access_token: "fresh-access" });
  });

  it("stops before any login when credentials are missing", async () => {
    const authorizer = new Authorizer(testConfig(dataDir, { clientId: "", clientSecret: "" }), { browser, prompt });

    await expect(authorizer.authorizeAccounts("full")).rejects.toThrow(
      "Missing Spotify API credentials: client_id (SPOTIFY_CLIENT_ID), client_secret (SPOTIFY_CLIENT_SECRET)."
    );
    expect(prompt.ask).not.toHaveBeenCalled();
  });
});
