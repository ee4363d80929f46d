import { Command, Option } from "commander";
import type { SyncMode } from "./types";

export const ARGUMENT_ERROR_EXIT_CODE = 2;

export interface CliOptions {
  configPath?: string;
  mode: SyncMode;
}

export function createProgram(): Command {
  return new Command()
    .name("spotify-library-sync")
    .description(
      "Copy saved tracks, followed artists, saved albums and playlists from one or more Spotify accounts to others."
    )
    .version("1.0.0")
    .option(
      "-c, --config <path>",
      "Config file to use. Without it the conventional locations are searched; " +
        "if none exists the built-in defaults are used."
    )
    .addOption(
      new Option(
        "-r, --read-only",
        "Only read the sources and store snapshots, without writing to the destinations."
      ).conflicts("writeOnly")
    )
    .addOption(
      new Option(
        "-w, --write-only",
        "Only write the stored snapshots to the destinations, without reading the sources."
      )
    )
    .showHelpAfterError()
    .exitOverride();
}

/** Throws `CommanderError` for argument errors and for `--help` / `--version`. */
export function parseCliArguments(argv: string[], program: Command = createProgram()): CliOptions {
  program.parse(argv);

  const opts = program.opts<{ config?: string; readOnly?: boolean; writeOnly?: boolean }>();
  const mode: SyncMode = opts.readOnly ? "read-only" : opts.writeOnly ? "write-only" : "full";

  return { configPath: opts.config, mode };
}
