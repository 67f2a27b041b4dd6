import fs from "node:fs";
import path from "node:path";
import type { InstallManifest, Settings } from "../shared/types.js";
import { LibraryError, describeError } from "./errors.js";
import { log } from "./logger.js";
import { directorySize, isDirectory } from "./scanner.js";
import type { SteamClient } from "./steam.js";
import { getVdfObject, getVdfString, parseVdf, stringifyVdf, type VdfObject } from "./vdf.js";

const KNOWN_FIELDS = new Set([
  "appid",
  "name",
  "installdir",
  "stateflags",
  "lastowner",
  "buildid",
  "sizeondisk"
]);

export type ManifestDeps = {
  settings: Settings;
  client: SteamClient;
};

export type EnsureManifestResult =
  | { ok: true; created: boolean; manifestPath: string }
  | { ok: false; error: LibraryError };

export function getManifestPath(settings: Settings, appid: number): string {
  return path.join(settings.steamLibrary, `appmanifest_${appid}.acf`);
}

export function manifestExists(settings: Settings, appid: number): boolean {
  return readManifest(settings, appid) !== null;
}

export function readManifest(settings: Settings, appid: number): InstallManifest | null {
  const filePath = getManifestPath(settings, appid);
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch {
    return null;
  }
  try {
    return parseManifest(raw);
  } catch (error) {
    log("warn", "Ignoring unreadable appmanifest", { filePath, error: describeError(error) });
    return null;
  }
}

export function parseManifest(raw: string): InstallManifest | null {
  const root = parseVdf(raw);
  const state = getVdfObject(root, "AppState");
  if (!state) return null;

  const appid = Number(getVdfString(state, "appid"));
  const installdir = getVdfString(state, "installdir")?.trim();
  if (!Number.isInteger(appid) || appid <= 0 || !installdir) return null;

  const extra: Record<string, string> = {};
  for (const [key, value] of Object.entries(state)) {
    if (typeof value === "string" && !KNOWN_FIELDS.has(key.toLowerCase())) extra[key] = value;
  }
  const size = Number(getVdfString(state, "SizeOnDisk"));
  return {
    appid,
    installdir,
    name: getVdfString(state, "name"),
    stateFlags: getVdfString(state, "StateFlags"),
    lastOwner: getVdfString(state, "LastOwner"),
    buildId: getVdfString(state, "buildid"),
    sizeOnDisk: Number.isFinite(size) ? size : undefined,
    extra
  };
}

export function buildManifest(
  settings: Settings,
  appid: number,
  installPath: string,
  now: Date = new Date()
): VdfObject {
  const folderName = path.basename(installPath);
  return {
    AppState: {
      appid: String(appid),
      Universe: "1",
      name: folderName,
      StateFlags: "4",
      installdir: folderName,
      LastUpdated: String(Math.floor(now.getTime() / 1000)),
      UpdateResult: "0",
      SizeOnDisk: String(directorySize(installPath)),
      buildid: "0",
      LastOwner: settings.steamId,
      BytesToDownload: "0",
      BytesDownloaded: "0",
      AutoUpdateBehavior: "2",
      AllowOtherDownloadsWhileRunning: "1"
    }
  };
}

export function writeManifest(filePath: string, manifest: VdfObject): void {
  const tmp = `${filePath}.${process.pid}.tmp`;
  try {
    fs.writeFileSync(tmp, stringifyVdf(manifest), "utf-8");
    fs.renameSync(tmp, filePath);
  } catch (error) {
    fs.rmSync(tmp, { force: true });
    throw error;
  }
}

export function ensureManifest(deps: ManifestDeps, appid: number, installPath: string): EnsureManifestResult {
  const { settings, client } = deps;
  const manifestPath = getManifestPath(settings, appid);

  // Any file already at the path is left alone, even one we cannot parse.
  if (fs.existsSync(manifestPath)) {
    if (!manifestExists(settings, appid)) {
      return {
        ok: false,
        error: new LibraryError(
          "ManifestWriteFailed",
          `Existing manifest is not a valid AppState, leaving it untouched: ${manifestPath}`,
          { appid, path: manifestPath }
        )
      };
    }
    log("info", "Manifest already exists", { appid, manifestPath });
    return { ok: true, created: false, manifestPath };
  }

  if (!isDirectory(installPath)) {
    return {
      ok: false,
      error: new LibraryError("ManifestWriteFailed", `Install directory does not exist: ${installPath}`, {
        appid,
        path: installPath
      })
    };
  }

  try {
    writeManifest(manifestPath, buildManifest(settings, appid, installPath));
  } catch (error) {
    return {
      ok: false,
      error: new LibraryError("ManifestWriteFailed", `Could not write ${manifestPath}`, {
        appid,
        path: manifestPath,
        cause: error
      })
    };
  }
  if (!manifestExists(settings, appid)) {
    return {
      ok: false,
      error: new LibraryError("ManifestWriteFailed", `Manifest unreadable after write: ${manifestPath}`, {
        appid,
        path: manifestPath
      })
    };
  }
  log("info", "Manifest written", { appid, manifestPath });

  // Not awaited: the relaunch is not part of the install result.
  void client.restart().catch((error: unknown) => {
    log("warn", "Steam client restart failed", { error: describeError(error) });
  });
  return { ok: true, created: true, manifestPath };
}

export function removeManifest(settings: Settings, appid: number): boolean {
  const manifestPath = getManifestPath(settings, appid);
  if (!fs.existsSync(manifestPath)) return false;
  fs.rmSync(manifestPath, { force: true });
  log("info", "Manifest removed", { appid, manifestPath });
  return true;
}
