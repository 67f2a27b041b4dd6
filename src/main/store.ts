import fs from "node:fs";
import Database from "better-sqlite3";
import type { GameInfo, GameRecord, GameStatus, SelectionEntry } from "../shared/types.js";
import { LibraryError } from "./errors.js";
import { log } from "./logger.js";

type GameRow = {
  appid: number;
  name: string | null;
  playtime_forever: number | null;
  last_played: number | null;
  installed: number | null;
};

type GameInfoRow = {
  appid: number;
  name: string | null;
  playtime: string;
  lastPlayed: string;
  status: GameStatus;
};

type SelectionRow = {
  label: string;
  appid: number;
};

const SCHEMA = `
CREATE TABLE IF NOT EXISTS games (
    appid INTEGER PRIMARY KEY,
    name TEXT,
    playtime_forever INTEGER,
    last_played INTEGER,
    installed BOOLEAN
)`;

const STATUS_SQL = "CASE installed WHEN 1 THEN 'Installed' ELSE 'Not installed' END";

const STATUS_SUFFIX = / \[(?:Installed|Not installed)\]$/;

export class LibraryStore {
  private constructor(
    private readonly db: Database.Database,
    readonly filePath: string
  ) {}

  static open(filePath: string): LibraryStore {
    if (!fs.existsSync(filePath)) {
      throw new LibraryError("StoreUnavailable", `Database not found at ${filePath}`, { path: filePath });
    }
    let db: Database.Database | null = null;
    try {
      db = new Database(filePath, { fileMustExist: true });
      const table = db
        .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'games'")
        .get();
      if (!table) {
        throw new LibraryError("StoreUnavailable", `Database at ${filePath} has no games table`, { path: filePath });
      }
      return new LibraryStore(db, filePath);
    } catch (error) {
      db?.close();
      if (error instanceof LibraryError) throw error;
      throw new LibraryError("StoreUnavailable", `Database at ${filePath} is unreadable`, {
        path: filePath,
        cause: error
      });
    }
  }

  static create(filePath: string): LibraryStore {
    const db = new Database(filePath);
    db.exec(SCHEMA);
    return new LibraryStore(db, filePath);
  }

  assertAvailable(): void {
    if (!fs.existsSync(this.filePath)) {
      throw new LibraryError("StoreUnavailable", `Database not found at ${this.filePath}`, { path: this.filePath });
    }
  }

  markInstalled(appid: number): boolean {
    return this.setInstalled(appid, true);
  }

  markUninstalled(appid: number): boolean {
    return this.setInstalled(appid, false);
  }

  getGame(appid: number): GameRecord | null {
    this.assertAvailable();
    const row = this.run(() =>
      this.db
        .prepare<[number], GameRow>(
          "SELECT appid, name, playtime_forever, last_played, installed FROM games WHERE appid = ?"
        )
        .get(appid)
    );
    if (!row) return null;
    return {
      appid: row.appid,
      name: row.name ?? "",
      playtimeForever: row.playtime_forever ?? 0,
      lastPlayed: row.last_played ?? 0,
      installed: row.installed === 1
    };
  }

  getGameInfo(appid: number): GameInfo {
    this.assertAvailable();
    const row = this.run(() =>
      this.db
        .prepare<[number], GameInfoRow>(
          `SELECT
              appid,
              name,
              printf('%dh %dm', COALESCE(playtime_forever, 0) / 60, COALESCE(playtime_forever, 0) % 60) AS playtime,
              CASE WHEN last_played > 0 THEN datetime(last_played, 'unixepoch') ELSE 'Never' END AS lastPlayed,
              ${STATUS_SQL} AS status
           FROM games
           WHERE appid = ?`
        )
        .get(appid)
    );
    if (!row) {
      throw new LibraryError("NotFound", `No game with appid ${appid}`, { appid });
    }
    return { ...row, name: row.name ?? "" };
  }

  listForSelection(): Iterable<SelectionEntry> {
    this.assertAvailable();
    const statement = this.run(() =>
      this.db.prepare<[], SelectionRow>(
        `SELECT COALESCE(name, '') || ' [' || ${STATUS_SQL} || ']' AS label, appid
         FROM games
         ORDER BY installed ASC, name ASC`
      )
    );
    return {
      [Symbol.iterator]: function* (): Generator<SelectionEntry> {
        for (const row of statement.iterate()) {
          yield { label: row.label, appid: row.appid };
        }
      }
    };
  }

  upsertGames(records: GameRecord[]): number {
    this.assertAvailable();
    // installed is only set for new rows; after that it belongs to install/uninstall.
    this.run(() => {
      const statement = this.db.prepare<[number, string, number, number, number]>(
        `INSERT INTO games (appid, name, playtime_forever, last_played, installed)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(appid) DO UPDATE SET
           name = excluded.name,
           playtime_forever = excluded.playtime_forever,
           last_played = excluded.last_played`
      );
      const upsert = this.db.transaction((rows: GameRecord[]) => {
        for (const r of rows) {
          statement.run(r.appid, r.name, r.playtimeForever, r.lastPlayed, r.installed ? 1 : 0);
        }
      });
      upsert(records);
    });
    return records.length;
  }

  close(): void {
    this.db.close();
  }

  private setInstalled(appid: number, installed: boolean): boolean {
    this.assertAvailable();
    const result = this.run(() =>
      this.db.prepare<[number, number]>("UPDATE games SET installed = ? WHERE appid = ?").run(installed ? 1 : 0, appid)
    );
    if (result.changes === 0) {
      log("warn", "No game row to update", { appid, installed });
      return false;
    }
    return true;
  }

  private run<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new LibraryError("StoreUnavailable", `Database at ${this.filePath} is unreadable`, {
        path: this.filePath,
        cause: error
      });
    }
  }
}

export function parseSelectionLabel(label: string): string {
  return label.replace(STATUS_SUFFIX, "");
}
