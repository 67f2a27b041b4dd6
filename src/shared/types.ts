export type InstallState =
  | "NotInstalled"
  | "Installing"
  | "Validating"
  | "Reconciling"
  | "Installed"
  | "Removing"
  | "Failed";

export type GameStatus = "Installed" | "Not installed";

export type GameRecord = {
  appid: number;
  name: string;
  playtimeForever: number;
  lastPlayed: number;
  installed: boolean;
};

export type GameInfo = {
  appid: number;
  name: string;
  playtime: string;
  lastPlayed: string;
  status: GameStatus;
};

export type SelectionEntry = {
  label: string;
  appid: number;
};

export type InstallManifest = {
  appid: number;
  installdir: string;
  name?: string;
  stateFlags?: string;
  lastOwner?: string;
  buildId?: string;
  sizeOnDisk?: number;
  extra: Record<string, string>;
};

export type Settings = {
  projectRoot: string;
  accountName: string;
  steamId: string;
  steamLibrary: string;
  installRoot: string;
  steamCmdPath: string;
  steamExecutable: string;
  databasePath: string;
  logDir: string;
};

export type InstallStatus = {
  appid: number;
  state: InstallState;
  message: string;
};

export type OperationResult = {
  ok: boolean;
  appid: number;
  state: InstallState;
  message: string;
  installPath?: string;
  warnings: string[];
  error?: Error;
};
