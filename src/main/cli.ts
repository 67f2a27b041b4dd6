import { Command, InvalidArgumentError } from "commander";
import type { InstallStatus, OperationResult, Settings } from "../shared/types.js";
import { describeError } from "./errors.js";
import { installGame, uninstallGame, type InstallDeps } from "./install.js";
import type { SteamClient } from "./steam.js";
import type { Installer } from "./steamcmd.js";
import type { LibraryStore } from "./store.js";

export type CliContext = {
  settings: Settings;
  openStore: () => LibraryStore;
  installer: Installer;
  client: SteamClient;
  print: (line: string) => void;
  setExitCode: (code: number) => void;
};

export function parseAppId(value: string): number {
  const appid = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(appid) || appid <= 0) {
    throw new InvalidArgumentError("AppID must be a positive integer.");
  }
  return appid;
}

export function formatStatusLine(status: InstallStatus): string {
  switch (status.state) {
    case "Failed":
      return `❌ ${status.message}`;
    case "Installed":
    case "NotInstalled":
      return `✅ ${status.message}`;
    default:
      return `   ${status.message}`;
  }
}

export function formatInfoTable(info: { name: string; playtime: string; lastPlayed: string; status: string }): string[] {
  return [
    "| Name                           | Playtime   | Last Played          | Status",
    "--------------------------------------------------------------------------",
    `| ${info.name.padEnd(30)} | ${info.playtime.padEnd(10)} | ${info.lastPlayed.padEnd(20)} | ${info.status.padEnd(12)}`
  ];
}

export function createProgram(ctx: CliContext): Command {
  const program = new Command();
  program
    .name("steam-shelf")
    .description("Install, uninstall and inspect games in a SteamCMD-managed library")
    .option("--verbose", "echo log lines to the console")
    .showHelpAfterError();

  program
    .command("list")
    .description("List games, not-installed first, as '<label>|<appid>'")
    .action(() => {
      withStore(ctx, (store) => {
        for (const entry of store.listForSelection()) ctx.print(`${entry.label}|${entry.appid}`);
      });
    });

  program
    .command("info")
    .description("Show playtime, last played and install status for a game")
    .argument("<appid>", "Steam AppID", parseAppId)
    .action((appid: number) => {
      withStore(ctx, (store) => {
        for (const line of formatInfoTable(store.getGameInfo(appid))) ctx.print(line);
      });
    });

  program
    .command("install")
    .description("Install a game with SteamCMD and register it with the Steam client")
    .argument("<appid>", "Steam AppID", parseAppId)
    .argument("[name...]", "display name (defaults to the name in the library database)")
    .action(async (appid: number, nameParts: string[]) => {
      await runOperation(ctx, appid, nameParts, installGame);
    });

  program
    .command("uninstall")
    .description("Remove a game's files and manifest and mark it not installed")
    .argument("<appid>", "Steam AppID", parseAppId)
    .argument("[name...]", "display name (defaults to the name in the library database)")
    .action(async (appid: number, nameParts: string[]) => {
      await runOperation(ctx, appid, nameParts, uninstallGame);
    });

  program
    .command("client-status")
    .description("Report whether the Steam client is running")
    .action(async () => {
      const running = await ctx.client.isRunning();
      ctx.print(running ? "Steam is running." : "Steam is not running.");
    });

  return program;
}

type Operation = (
  deps: InstallDeps,
  name: string,
  appid: number,
  onStatus: (status: InstallStatus) => void
) => Promise<OperationResult>;

async function runOperation(ctx: CliContext, appid: number, nameParts: string[], operation: Operation): Promise<void> {
  let store: LibraryStore;
  try {
    store = ctx.openStore();
  } catch (error) {
    ctx.print(`❌ ${describeError(error)}`);
    ctx.setExitCode(1);
    return;
  }
  try {
    const name = nameParts.length > 0 ? nameParts.join(" ") : store.getGameInfo(appid).name;
    const deps: InstallDeps = { settings: ctx.settings, store, installer: ctx.installer, client: ctx.client };
    const result = await operation(deps, name, appid, (status) => ctx.print(formatStatusLine(status)));
    for (const warning of result.warnings) ctx.print(`⚠️ ${warning}`);
    if (!result.ok) ctx.setExitCode(1);
  } catch (error) {
    ctx.print(`❌ ${describeError(error)}`);
    ctx.setExitCode(1);
  } finally {
    store.close();
  }
}

function withStore(ctx: CliContext, fn: (store: LibraryStore) => void): void {
  let store: LibraryStore | null = null;
  try {
    store = ctx.openStore();
    fn(store);
  } catch (error) {
    ctx.print(`❌ ${describeError(error)}`);
    ctx.setExitCode(1);
  } finally {
    store?.close();
  }
}
