import fs from "node:fs";
import type { InstallState, InstallStatus, OperationResult, Settings } from "../shared/types.js";
import { LibraryError, describeError } from "./errors.js";
import { log } from "./logger.js";
import { ensureManifest, removeManifest } from "./manifest.js";
import { createInstallationContext, type InstallationContext } from "./paths.js";
import { inspectInstallDir, isValidInstallDir } from "./scanner.js";
import type { SteamClient } from "./steam.js";
import type { Installer } from "./steamcmd.js";
import type { LibraryStore } from "./store.js";

export type InstallDeps = {
  settings: Settings;
  store: LibraryStore;
  installer: Installer;
  client: SteamClient;
};

export type StatusListener = (status: InstallStatus) => void;

export async function installGame(
  deps: InstallDeps,
  name: string,
  appid: number,
  onStatus?: StatusListener
): Promise<OperationResult> {
  const { settings, store, installer } = deps;
  const report = reporter(appid, onStatus);
  const warnings: string[] = [];
  let context: InstallationContext | undefined;

  log("info", "Install requested", { appid, name });
  try {
    store.assertAvailable();
    requireGame(store, appid);
    context = createInstallationContext(settings, name, appid);
    report("Installing", `Installing ${name} (${appid}) into ${context.installPath}`);

    try {
      fs.mkdirSync(context.installPath, { recursive: true });
    } catch (error) {
      throw new LibraryError("FilesystemError", `Could not create ${context.installPath}`, {
        appid,
        path: context.installPath,
        cause: error
      });
    }

    const outcome = await installer.run({
      account: settings.accountName,
      appid,
      installPath: context.installPath
    });
    if (outcome.exitCode !== 0) {
      const detail = outcome.signal ? `signal ${outcome.signal}` : `exit code ${outcome.exitCode}`;
      warnings.push(`SteamCMD finished with ${detail}`);
      log("warn", "SteamCMD reported failure; validating files anyway", { appid, ...outcome });
    }

    report("Validating", `Validating ${context.installPath}`);
    const files = validateOrThrow(context);
    report("Validating", `Installation directory verified (${files} files)`);

    const resolved = createInstallationContext(settings, name, appid);
    if (resolved.installPath !== context.installPath) {
      const message = `Install directory changed during install: ${context.installPath} -> ${resolved.installPath}`;
      warnings.push(message);
      log("warn", message, { appid });
      validateOrThrow(resolved);
    }
    context = resolved;

    report("Reconciling", `Ensuring Steam manifest for ${appid}`);
    const manifest = ensureManifest(deps, appid, context.installPath);
    if (!manifest.ok) {
      warnings.push(`Manifest creation failed: ${manifest.error.message}`);
      log("warn", "Manifest creation failed", { appid, error: describeError(manifest.error) });
    } else if (manifest.created) {
      report("Reconciling", `Manifest written to ${manifest.manifestPath}; restarting Steam`);
    }

    store.markInstalled(appid);
    const message = `${name} successfully installed and recorded.`;
    report("Installed", message);
    return { ok: true, appid, state: "Installed", message, installPath: context.installPath, warnings };
  } catch (error) {
    return fail(report, appid, error, warnings, context?.installPath);
  }
}

export async function uninstallGame(
  deps: InstallDeps,
  name: string,
  appid: number,
  onStatus?: StatusListener
): Promise<OperationResult> {
  const { settings, store } = deps;
  const report = reporter(appid, onStatus);
  const warnings: string[] = [];
  let installPath: string | undefined;

  log("info", "Uninstall requested", { appid, name });
  try {
    store.assertAvailable();
    requireGame(store, appid);
  } catch (error) {
    return fail(report, appid, error, warnings);
  }

  report("Removing", `Uninstalling ${name} (${appid})`);
  try {
    const context = createInstallationContext(settings, name, appid);
    installPath = context.installPath;
    if (fs.existsSync(context.installPath)) {
      fs.rmSync(context.installPath, { recursive: true, force: true });
      report("Removing", `Removed ${context.installPath}`);
    }
  } catch (error) {
    warnings.push(`Could not remove install directory: ${describeError(error)}`);
    log("warn", "Install directory cleanup failed", { appid, installPath, error: describeError(error) });
  }

  try {
    if (removeManifest(settings, appid)) report("Removing", `Removed manifest for ${appid}`);
  } catch (error) {
    warnings.push(`Could not remove manifest: ${describeError(error)}`);
    log("warn", "Manifest cleanup failed", { appid, error: describeError(error) });
  }

  try {
    store.markUninstalled(appid);
  } catch (error) {
    return fail(report, appid, error, warnings, installPath);
  }

  const message = `${name} uninstalled.`;
  report("NotInstalled", message);
  return { ok: true, appid, state: "NotInstalled", message, installPath, warnings };
}

// Records come from the library sync only; install and uninstall never create them.
function requireGame(store: LibraryStore, appid: number): void {
  if (!store.getGame(appid)) {
    throw new LibraryError("NotFound", `No game with appid ${appid}`, { appid });
  }
}

type Report = (state: InstallState, message: string) => void;

function fail(
  report: Report,
  appid: number,
  error: unknown,
  warnings: string[],
  installPath?: string
): OperationResult {
  const message = describeError(error);
  report("Failed", message);
  return {
    ok: false,
    appid,
    state: "Failed",
    message,
    installPath,
    warnings,
    error: error instanceof Error ? error : new Error(message)
  };
}

function validateOrThrow(context: InstallationContext): number {
  const inspection = inspectInstallDir(context.installPath);
  if (!inspection.exists) {
    throw new LibraryError("ValidationFailed", `Installation directory does not exist: ${context.installPath}`, {
      appid: context.appid,
      path: context.installPath
    });
  }
  if (!isValidInstallDir(inspection)) {
    throw new LibraryError("ValidationFailed", `Installation directory is empty: ${context.installPath}`, {
      appid: context.appid,
      path: context.installPath
    });
  }
  return inspection.totalFiles;
}

function reporter(appid: number, onStatus?: StatusListener): Report {
  return (state, message) => {
    log(state === "Failed" ? "error" : "info", message, { appid, state });
    onStatus?.({ appid, state, message });
  };
}
