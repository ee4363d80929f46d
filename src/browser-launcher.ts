import { spawn } from "node:child_process";
import { logger } from "./logger";

export const BROWSER_NAMES = ["default", "firefox", "chrome", "chromium", "opera", "none"] as const;

export type BrowserName = (typeof BROWSER_NAMES)[number];

type NamedBrowser = Exclude<BrowserName, "default" | "none">;

export interface BrowserSettings {
  name: BrowserName;
  /** Open a private / incognito window where the browser supports one. */
  private: boolean;
}

export interface LaunchCommand {
  command: string;
  args: string[];
}

export interface BrowserLauncher {
  /** Resolves to `false` when no browser could be started. */
  open(url: string): Promise<boolean>;
}

const PRIVATE_FLAGS: Record<NamedBrowser, string> = {
  firefox: "-private-window",
  chrome: "--incognito",
  chromium: "--incognito",
  opera: "--private"
};

const LINUX_BINARIES: Record<NamedBrowser, string> = {
  firefox: "firefox",
  chrome: "google-chrome",
  chromium: "chromium",
  opera: "opera"
};

const MAC_APPLICATIONS: Record<NamedBrowser, string> = {
  firefox: "Firefox",
  chrome: "Google Chrome",
  chromium: "Chromium",
  opera: "Opera"
};

const WINDOWS_EXECUTABLES: Record<NamedBrowser, string> = {
  firefox: "firefox",
  chrome: "chrome",
  chromium: "chromium",
  opera: "opera"
};

/** `cmd /c start` re-parses its arguments, so `&` and friends in a URL must be caret-escaped. */
export function escapeForCmd(value: string): string {
  return value.replace(/[&|<>^]/g, "^$&");
}

export function isBrowserName(value: string): value is BrowserName {
  return BROWSER_NAMES.some((name) => name === value);
}

export function resolveLaunchCommand(
  settings: BrowserSettings,
  url: string,
  platform: NodeJS.Platform = process.platform
): LaunchCommand | null {
  if (settings.name === "none") {
    return null;
  }

  if (settings.name === "default") {
    if (platform === "win32") {
      return { command: "cmd", args: ["/c", "start", "", escapeForCmd(url)] };
    }

    if (platform === "darwin") {
      return { command: "open", args: [url] };
    }

    return { command: "xdg-open", args: [url] };
  }

  const browserArgs = settings.private ? [PRIVATE_FLAGS[settings.name], url] : [url];

  if (platform === "win32") {
    return {
      command: "cmd",
      args: ["/c", "start", "", WINDOWS_EXECUTABLES[settings.name], ...browserArgs.map(escapeForCmd)]
    };
  }

  if (platform === "darwin") {
    return { command: "open", args: ["-na", MAC_APPLICATIONS[settings.name], "--args", ...browserArgs] };
  }

  return { command: LINUX_BINARIES[settings.name], args: browserArgs };
}

export class SystemBrowserLauncher implements BrowserLauncher {
  constructor(
    private readonly settings: BrowserSettings,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  open(url: string): Promise<boolean> {
    const launch = resolveLaunchCommand(this.settings, url, this.platform);
    if (!launch) {
      return Promise.resolve(false);
    }

    if (this.settings.name === "default" && this.settings.private) {
      logger.debug("The system default browser cannot be asked for a private window; opening a normal one.");
    }

    return new Promise((resolve) => {
      const child = spawn(launch.command, launch.args, { detached: true, stdio: "ignore" });

      child.once("spawn", () => {
        child.unref();
        resolve(true);
      });
      child.once("error", (error) => {
        logger.warn(`Could not start browser (${launch.command}): ${error.message}`);
        resolve(false);
      });
    });
  }
}
