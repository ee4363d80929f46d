import "dotenv/config";
import { promises as fs, statSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { parse } from "yaml";
import { type BrowserSettings, BROWSER_NAMES, isBrowserName } from "./browser-launcher";
import { logger } from "./logger";
import type { AccountGroup } from "./types";

export const CONFIG_FILE_NAME = "spotify-library-sync.yaml";
export const DEFAULTS_FILE_PATH = path.resolve(__dirname, "..", "conf", "defaults.yaml");
export const MAX_PAGE_SIZE = 50;

export const DEFAULT_SEARCH_PATHS: readonly string[] = [
  path.join("~", `.${CONFIG_FILE_NAME}`),
  path.resolve(__dirname, "..", CONFIG_FILE_NAME),
  path.join("/etc", CONFIG_FILE_NAME)
];

export interface AccountSettings {
  username: string;
}

export interface AppConfig {
  clientId: string;
  clientSecret: string;
  redirectUrl: string;
  dataDir: string;
  pageSize: number;
  browser: BrowserSettings;
  sources: Map<string, AccountSettings>;
  destinations: Map<string, AccountSettings>;
}

export interface LoadConfigOptions {
  /** Path given on the command line; searched before the conventional locations. */
  configPath?: string;
  searchPaths?: readonly string[];
  defaultsPath?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type ConfigTree = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function expandHome(filePath: string): string {
  if (filePath === "~") {
    return os.homedir();
  }

  if (filePath.startsWith("~/") || filePath.startsWith("~\\")) {
    return path.join(os.homedir(), filePath.slice(2));
  }

  return filePath;
}

/** Mappings merge key by key; any other value in `override` replaces the one in `base`. */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const merged: ConfigTree = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }

  return merged;
}

function isFile(filePath: string): boolean {
  return statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
}

export function findConfigFiles(
  configPath?: string,
  searchPaths: readonly string[] = DEFAULT_SEARCH_PATHS
): string[] {
  const candidates = configPath !== undefined ? [configPath, ...searchPaths] : [...searchPaths];
  const found: string[] = [];

  for (const candidate of candidates) {
    const resolved = path.resolve(expandHome(candidate));
    if (isFile(resolved) && !found.includes(resolved)) {
      found.push(resolved);
    }
  }

  return found;
}

async function readYamlFile(filePath: string): Promise<ConfigTree> {
  const raw = await fs.readFile(filePath, "utf8");

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid YAML: ${(error as Error).message}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping at the top level.`);
  }

  return parsed;
}

function readString(tree: ConfigTree, key: string): string {
  const value = tree[key];
  if (value === undefined || value === null) {
    return "";
  }

  if (typeof value !== "string" && typeof value !== "number") {
    throw new ConfigError(`Config key "${key}" must be a string.`);
  }

  return String(value).trim();
}

function readAccounts(tree: ConfigTree, group: AccountGroup): Map<string, AccountSettings> {
  const accounts = new Map<string, AccountSettings>();
  const value = tree[group];
  if (value === undefined || value === null) {
    return accounts;
  }

  if (!isRecord(value)) {
    throw new ConfigError(`Config key "${group}" must be a mapping of account names to account settings.`);
  }

  for (const [accountName, settings] of Object.entries(value)) {
    const username = isRecord(settings) ? settings.username : undefined;
    if ((typeof username !== "string" && typeof username !== "number") || String(username).trim() === "") {
      throw new ConfigError(`Account "${group}.${accountName}" needs a non-empty "username".`);
    }

    accounts.set(accountName, { username: String(username).trim() });
  }

  return accounts;
}

function readPageSize(tree: ConfigTree): number {
  const value = tree.page_size ?? 20;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > MAX_PAGE_SIZE) {
    throw new ConfigError(`Config key "page_size" must be an integer between 1 and ${MAX_PAGE_SIZE}.`);
  }

  return value;
}

function readBrowser(tree: ConfigTree): BrowserSettings {
  const value = tree.browser ?? {};
  if (!isRecord(value)) {
    throw new ConfigError('Config key "browser" must be a mapping.');
  }

  const name = value.name ?? "default";
  if (typeof name !== "string" || !isBrowserName(name)) {
    throw new ConfigError(`Config key "browser.name" must be one of: ${BROWSER_NAMES.join(", ")}.`);
  }

  const isPrivate = value.private ?? true;
  if (typeof isPrivate !== "boolean") {
    throw new ConfigError('Config key "browser.private" must be true or false.');
  }

  return { name, private: isPrivate };
}

export function parseConfig(tree: ConfigTree, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = env.PS_DATA_DIR?.trim() || readString(tree, "data_dir");
  if (!dataDir) {
    throw new ConfigError('Config key "data_dir" is required (or set PS_DATA_DIR).');
  }

  return {
    clientId: readString(tree, "client_id") || env.SPOTIFY_CLIENT_ID?.trim() || "",
    clientSecret: readString(tree, "client_secret") || env.SPOTIFY_CLIENT_SECRET?.trim() || "",
    redirectUrl: readString(tree, "redirect_url") || env.SPOTIFY_REDIRECT_URI?.trim() || "",
    dataDir: path.resolve(expandHome(dataDir)),
    pageSize: readPageSize(tree),
    browser: readBrowser(tree),
    sources: readAccounts(tree, "sources"),
    destinations: readAccounts(tree, "destinations")
  };
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const defaultsPath = options.defaultsPath ?? DEFAULTS_FILE_PATH;

  if (options.configPath !== undefined && !isFile(path.resolve(expandHome(options.configPath)))) {
    logger.warn(`Config file ${options.configPath} was not found. Continuing with the next available settings.`);
  }

  const userPath = findConfigFiles(options.configPath, options.searchPaths)[0] ?? null;
  if (userPath === null) {
    logger.warn("No user config file found. Continuing with default settings.");
  }

  let tree: ConfigTree | null = null;
  if (isFile(defaultsPath)) {
    tree = await readYamlFile(defaultsPath);
  } else {
    logger.warn(`Default settings file ${defaultsPath} is missing.`);
  }

  if (userPath !== null) {
    logger.info(`Loading config from ${userPath}.`);
    const userTree = await readYamlFile(userPath);
    tree = tree ? deepMerge(tree, userTree) : userTree;
  }

  if (tree === null) {
    throw new ConfigError("No usable configuration found: neither default settings nor a user config file exist.");
  }

  return parseConfig(tree, options.env ?? process.env);
}

/** Usernames of every configured source account; decides whether a playlist is copied or followed. */
export function sourceUsernames(config: AppConfig): Set<string> {
  return new Set([...config.sources.values()].map((account) => account.username));
}
