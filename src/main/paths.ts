import path from "node:path";
import type { Settings } from "../shared/types.js";
import { LibraryError } from "./errors.js";
import { log } from "./logger.js";
import { getManifestPath, readManifest } from "./manifest.js";

export type InstallationContext = Readonly<{
  appid: number;
  name: string;
  installPath: string;
  manifestPath: string;
  manifestInstalldir: string | null;
}>;

export function sanitizeName(name: string): string {
  return name.replace(/[^A-Za-z0-9_ -]/gu, "_");
}

export function resolveInstallPath(settings: Settings, name: string, appid: number): string {
  return createInstallationContext(settings, name, appid).installPath;
}

/**
 * Steam's manifest wins over the sanitized display name so an app already tracked under
 * another folder is never installed twice.
 */
export function createInstallationContext(settings: Settings, name: string, appid: number): InstallationContext {
  const manifestPath = getManifestPath(settings, appid);
  let manifestInstalldir = readManifest(settings, appid)?.installdir ?? null;
  if (manifestInstalldir !== null && !isPlainFolderName(manifestInstalldir)) {
    log("warn", "Ignoring manifest installdir outside the library root", { appid, manifestInstalldir });
    manifestInstalldir = null;
  }
  const folder = manifestInstalldir ?? sanitizeName(name);
  if (!isPlainFolderName(folder)) {
    throw new LibraryError("FilesystemError", `Cannot derive an install folder from name "${name}"`, { appid });
  }
  return Object.freeze({
    appid,
    name,
    installPath: path.join(settings.installRoot, folder),
    manifestPath,
    manifestInstalldir
  });
}

function isPlainFolderName(folder: string): boolean {
  if (folder.trim() === "" || folder === "." || folder === "..") return false;
  return !folder.includes("/") && !folder.includes("\\");
}
