#!/usr/bin/env node
import { createProgram } from "./cli.js";
import { describeError } from "./errors.js";
import { configureLogger, getLogPath, log } from "./logger.js";
import { loadSettings } from "./settings.js";
import { createSteamClient } from "./steam.js";
import { createSteamCmdInstaller } from "./steamcmd.js";
import { LibraryStore } from "./store.js";

async function main(argv: string[]): Promise<void> {
  const settings = loadSettings({ env: process.env });
  configureLogger({ directory: settings.logDir, console: argv.includes("--verbose") });
  log("info", "steam-shelf started", { logPath: getLogPath(), args: argv.slice(2) });

  const program = createProgram({
    settings,
    openStore: () => LibraryStore.open(settings.databasePath),
    installer: createSteamCmdInstaller(settings),
    client: createSteamClient(settings),
    print: (line) => console.log(line),
    setExitCode: (code) => {
      process.exitCode = code;
    }
  });
  await program.parseAsync(argv);
}

main(process.argv).catch((error: unknown) => {
  console.error(`❌ ${describeError(error)}`);
  process.exitCode = 1;
});
