import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { configureLogger } from "../src/main/logger.js";
import type { SteamClient } from "../src/main/steam.js";
import type { InstallerOutcome, InstallRequest, Installer } from "../src/main/steamcmd.js";
import { LibraryStore } from "../src/main/store.js";
import type { GameRecord, Settings } from "../src/shared/types.js";

export type Sandbox = {
  root: string;
  settings: Settings;
  cleanup: () => void;
};

export function createSandbox(): Sandbox {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "steam-shelf-"));
  const steamLibrary = path.join(root, "steamapps");
  const settings: Settings = {
    projectRoot: root,
    accountName: "test-user",
    steamId: "76561190000000001",
    steamLibrary,
    installRoot: path.join(steamLibrary, "common"),
    steamCmdPath: path.join(root, "bin", "steamcmd"),
    steamExecutable: "steam",
    databasePath: path.join(root, "steam_games.db"),
    logDir: path.join(root, "logs")
  };
  fs.mkdirSync(settings.installRoot, { recursive: true });
  configureLogger({ directory: settings.logDir, console: false });
  return { root, settings, cleanup: () => fs.rmSync(root, { recursive: true, force: true }) };
}

export function game(appid: number, name: string, overrides: Partial<GameRecord> = {}): GameRecord {
  return { appid, name, playtimeForever: 0, lastPlayed: 0, installed: false, ...overrides };
}

export function seedStore(settings: Settings, records: GameRecord[]): LibraryStore {
  const store = LibraryStore.create(settings.databasePath);
  store.upsertGames(records);
  return store;
}

export function writeFiles(dir: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const full = path.join(dir, relative);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }
}

export function writeAcf(settings: Settings, appid: number, installdir: string, extra = ""): string {
  const filePath = path.join(settings.steamLibrary, `appmanifest_${appid}.acf`);
  fs.mkdirSync(settings.steamLibrary, { recursive: true });
  fs.writeFileSync(
    filePath,
    `"AppState"\n{\n\t"appid"\t\t"${appid}"\n\t"installdir"\t\t"${installdir}"\n${extra}}\n`
  );
  return filePath;
}

export type FakeInstaller = Installer & { calls: InstallRequest[] };

export function fakeInstaller(
  behaviour: (request: InstallRequest) => InstallerOutcome | Promise<InstallerOutcome>
): FakeInstaller {
  const calls: InstallRequest[] = [];
  return {
    calls,
    run: async (request) => {
      calls.push(request);
      return behaviour(request);
    }
  };
}

export function installerWriting(files: Record<string, string>, exitCode = 0): FakeInstaller {
  return fakeInstaller((request) => {
    writeFiles(request.installPath, files);
    return { exitCode, signal: null };
  });
}

export type FakeClient = SteamClient & { restarts: number };

export function fakeClient(restart?: () => Promise<void>): FakeClient {
  const client: FakeClient = {
    restarts: 0,
    isRunning: async () => false,
    restart: async () => {
      client.restarts++;
      if (restart) await restart();
    }
  };
  return client;
}
