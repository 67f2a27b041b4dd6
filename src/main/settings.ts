import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import * as dotenv from "dotenv";
import { z } from "zod";
import type { Settings } from "../shared/types.js";
import { LibraryError } from "./errors.js";

const SETTINGS_FILE = "settings.json";
const ENV_FILE = ".env";

const DEFAULT_STEAMCMD = "/usr/bin/steamcmd";
const DEFAULT_STEAM_EXECUTABLE = "steam";

const SettingsFileSchema = z
  .object({
    steamLibrary: z.string().min(1),
    steamCmdPath: z.string().min(1),
    steamExecutable: z.string().min(1),
    databasePath: z.string().min(1),
    logDir: z.string().min(1)
  })
  .partial();

const EnvSchema = z.object({
  STEAM_USERNAME: z.string().trim().min(1),
  STEAM_ID: z.string().trim().regex(/^\d+$/, "must be a numeric SteamID64"),
  STEAMCMD: z.string().min(1).optional(),
  STEAM_LIBRARY: z.string().min(1).optional(),
  STEAM_EXECUTABLE: z.string().min(1).optional(),
  STEAM_SHELF_DB: z.string().min(1).optional(),
  STEAM_SHELF_LOG_DIR: z.string().min(1).optional()
});

type SettingsFile = z.infer<typeof SettingsFileSchema>;

export type LoadSettingsOptions = {
  projectRoot?: string;
  env?: Record<string, string | undefined>;
  homeDir?: string;
};

export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const projectRoot = path.resolve(options.projectRoot ?? process.cwd());
  const homeDir = options.homeDir ?? os.homedir();
  const fileSettings = readSettingsFile(path.join(projectRoot, SETTINGS_FILE));
  const env = { ...readEnvFile(path.join(projectRoot, ENV_FILE)), ...dropUndefined(options.env ?? {}) };

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join(".") : "environment";
    throw new LibraryError(
      "ConfigInvalid",
      `Required variable '${field}' is missing or invalid${issue ? ` (${issue.message})` : ""}`,
      { path: path.join(projectRoot, ENV_FILE) }
    );
  }
  const vars = parsed.data;

  const steamLibrary = resolveFrom(
    projectRoot,
    homeDir,
    vars.STEAM_LIBRARY ?? fileSettings.steamLibrary ?? path.join(homeDir, ".steam", "steam", "steamapps")
  );

  return Object.freeze({
    projectRoot,
    accountName: vars.STEAM_USERNAME,
    steamId: vars.STEAM_ID,
    steamLibrary,
    installRoot: path.join(steamLibrary, "common"),
    steamCmdPath: vars.STEAMCMD ?? fileSettings.steamCmdPath ?? DEFAULT_STEAMCMD,
    steamExecutable: vars.STEAM_EXECUTABLE ?? fileSettings.steamExecutable ?? DEFAULT_STEAM_EXECUTABLE,
    databasePath: resolveFrom(
      projectRoot,
      homeDir,
      vars.STEAM_SHELF_DB ?? fileSettings.databasePath ?? "steam_games.db"
    ),
    logDir: resolveFrom(projectRoot, homeDir, vars.STEAM_SHELF_LOG_DIR ?? fileSettings.logDir ?? "logs")
  });
}

function readSettingsFile(filePath: string): SettingsFile {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch {
    return {};
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new LibraryError("ConfigInvalid", `${SETTINGS_FILE} is not valid JSON`, {
      path: filePath,
      cause: error
    });
  }
  const parsed = SettingsFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new LibraryError(
      "ConfigInvalid",
      `${SETTINGS_FILE} field '${issue ? issue.path.join(".") : "?"}' is invalid`,
      { path: filePath }
    );
  }
  return parsed.data;
}

function readEnvFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) return {};
  return dotenv.parse(fs.readFileSync(filePath));
}

function dropUndefined(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function resolveFrom(projectRoot: string, homeDir: string, value: string): string {
  const expanded = value === "~" || value.startsWith("~/") ? path.join(homeDir, value.slice(1)) : value;
  return path.resolve(projectRoot, expanded);
}
