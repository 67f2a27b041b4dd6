import { spawn } from "node:child_process";
import readline from "node:readline";
import type { Settings } from "../shared/types.js";
import { LibraryError } from "./errors.js";
import { log } from "./logger.js";

export type InstallRequest = {
  account: string;
  appid: number;
  installPath: string;
};

export type InstallerOutcome = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
};

export type Installer = {
  run(request: InstallRequest): Promise<InstallerOutcome>;
};

export function buildSteamCmdArgs(request: InstallRequest): string[] {
  return [
    "+login",
    request.account,
    "+force_install_dir",
    request.installPath,
    "+app_update",
    String(request.appid),
    "validate",
    "+quit"
  ];
}

export function createSteamCmdInstaller(settings: Settings): Installer {
  return {
    run: (request) =>
      new Promise<InstallerOutcome>((resolve, reject) => {
        log("info", "Running SteamCMD", {
          executable: settings.steamCmdPath,
          appid: request.appid,
          installPath: request.installPath
        });
        // stdin stays attached so SteamCMD can prompt for a password or Steam Guard code.
        const child = spawn(settings.steamCmdPath, buildSteamCmdArgs(request), {
          stdio: ["inherit", "pipe", "pipe"]
        });
        for (const stream of [child.stdout, child.stderr]) {
          if (!stream) continue;
          readline.createInterface({ input: stream }).on("line", (line) => {
            log("debug", line, { appid: request.appid });
          });
        }
        child.on("error", (error) => {
          reject(
            new LibraryError("InstallerFailed", `Could not start ${settings.steamCmdPath}: ${error.message}`, {
              appid: request.appid,
              cause: error
            })
          );
        });
        child.on("close", (exitCode, signal) => {
          log("info", "SteamCMD exited", { appid: request.appid, exitCode, signal });
          resolve({ exitCode, signal });
        });
      })
  };
}
