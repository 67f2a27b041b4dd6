import { execFile, spawn } from "node:child_process";
import { setTimeout as delay } from "node:timers/promises";
import { promisify } from "node:util";
import psList from "ps-list";
import type { Settings } from "../shared/types.js";
import { log } from "./logger.js";

const execFileAsync = promisify(execFile);

const SHUTDOWN_GRACE_MS = 2000;

export type SteamClient = {
  isRunning(): Promise<boolean>;
  restart(): Promise<void>;
};

export function steamProcessName(platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? "steam.exe" : "steam";
}

export async function isSteamRunning(platform: NodeJS.Platform = process.platform): Promise<boolean> {
  const processes = await psList();
  const target = steamProcessName(platform);
  return processes.some((p) => p.name.toLowerCase() === target);
}

export async function closeSteam(platform: NodeJS.Platform = process.platform): Promise<void> {
  if (platform === "win32") {
    await execFileAsync("taskkill", ["/IM", "steam.exe", "/F"]);
    return;
  }
  await execFileAsync("pkill", ["-x", "steam"]);
}

export function launchSteam(executable: string): void {
  const child = spawn(executable, ["-silent"], { detached: true, stdio: "ignore", windowsHide: true });
  child.on("error", (error) => {
    log("warn", "Failed to launch Steam", { executable, error: error.message });
  });
  child.unref();
}

export function createSteamClient(settings: Settings): SteamClient {
  return {
    isRunning: () => isSteamRunning(),
    restart: async () => {
      log("info", "Refreshing Steam client");
      if (await isSteamRunning()) {
        log("info", "Closing running Steam instance");
        await closeSteam();
        await delay(SHUTDOWN_GRACE_MS);
      }
      launchSteam(settings.steamExecutable);
      log("info", "Steam relaunched", { executable: settings.steamExecutable });
    }
  };
}
