import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import { isLibraryError, type LibraryErrorCode } from "../src/main/errors.js";
import { LibraryStore, parseSelectionLabel } from "../src/main/store.js";
import { createSandbox, game, seedStore } from "./helpers.js";

const isCode = (code: LibraryErrorCode) => (error: unknown) => isLibraryError(error, code);

test("open fails with StoreUnavailable when the database file is missing", () => {
  const { settings, cleanup } = createSandbox();
  try {
    assert.throws(() => LibraryStore.open(settings.databasePath), isCode("StoreUnavailable"));
  } finally {
    cleanup();
  }
});

test("open fails with StoreUnavailable for a file that is not a library database", () => {
  const { settings, cleanup } = createSandbox();
  try {
    fs.writeFileSync(settings.databasePath, "");
    assert.throws(() => LibraryStore.open(settings.databasePath), /has no games table/);
    fs.writeFileSync(settings.databasePath, "this is not sqlite at all, just some plain text padding".repeat(4));
    assert.throws(() => LibraryStore.open(settings.databasePath), isCode("StoreUnavailable"));
  } finally {
    cleanup();
  }
});

test("getGameInfo formats playtime, last played and status", () => {
  const { settings, cleanup } = createSandbox();
  const store = seedStore(settings, [
    game(440, "Team Fortress 2", { playtimeForever: 125, lastPlayed: 1700000000 }),
    game(620, "Portal 2", { installed: true })
  ]);
  try {
    assert.deepEqual(store.getGameInfo(440), {
      appid: 440,
      name: "Team Fortress 2",
      playtime: "2h 5m",
      lastPlayed: "2023-11-14 22:13:20",
      status: "Not installed"
    });
    assert.deepEqual(store.getGameInfo(620), {
      appid: 620,
      name: "Portal 2",
      playtime: "0h 0m",
      lastPlayed: "Never",
      status: "Installed"
    });
  } finally {
    store.close();
    cleanup();
  }
});

test("getGameInfo fails with NotFound for an unknown appid", () => {
  const { settings, cleanup } = createSandbox();
  const store = seedStore(settings, []);
  try {
    assert.throws(() => store.getGameInfo(999), isCode("NotFound"));
  } finally {
    store.close();
    cleanup();
  }
});

test("markInstalled and markUninstalled are idempotent", () => {
  const { settings, cleanup } = createSandbox();
  const store = seedStore(settings, [game(440, "Team Fortress 2")]);
  try {
    assert.equal(store.markInstalled(440), true);
    assert.equal(store.markInstalled(440), true);
    assert.equal(store.getGameInfo(440).status, "Installed");
    assert.equal(store.markUninstalled(440), true);
    assert.equal(store.markUninstalled(440), true);
    assert.equal(store.getGameInfo(440).status, "Not installed");
    assert.equal(store.markInstalled(12345), false);
  } finally {
    store.close();
    cleanup();
  }
});

test("writes fail with StoreUnavailable once the database file is gone", () => {
  const { settings, cleanup } = createSandbox();
  const store = seedStore(settings, [game(440, "Team Fortress 2")]);
  try {
    fs.rmSync(settings.databasePath);
    assert.throws(() => store.markInstalled(440), isCode("StoreUnavailable"));
    assert.throws(() => store.markUninstalled(440), isCode("StoreUnavailable"));
  } finally {
    store.close();
    cleanup();
  }
});

test("listForSelection orders not-installed first, then by name, and can be iterated again", () => {
  const { settings, cleanup } = createSandbox();
  const store = seedStore(settings, [
    game(10, "Zeta"),
    game(20, "Alpha", { installed: true }),
    game(30, "Beta")
  ]);
  try {
    const entries = store.listForSelection();
    const expected = [
      { label: "Beta [Not installed]", appid: 30 },
      { label: "Zeta [Not installed]", appid: 10 },
      { label: "Alpha [Installed]", appid: 20 }
    ];
    assert.deepEqual(Array.from(entries), expected);
    assert.deepEqual(Array.from(entries), expected);
  } finally {
    store.close();
    cleanup();
  }
});

test("listForSelection can stop early", () => {
  const { settings, cleanup } = createSandbox();
  const store = seedStore(settings, [game(1, "A"), game(2, "B"), game(3, "C")]);
  try {
    const seen: number[] = [];
    for (const entry of store.listForSelection()) {
      seen.push(entry.appid);
      if (seen.length === 2) break;
    }
    assert.deepEqual(seen, [1, 2]);
    assert.equal(store.markInstalled(3), true);
  } finally {
    store.close();
    cleanup();
  }
});

test("upsertGames refreshes metadata but leaves the installed flag alone", () => {
  const { settings, cleanup } = createSandbox();
  const store = seedStore(settings, [game(440, "Team Fortress 2")]);
  try {
    store.markInstalled(440);
    store.upsertGames([game(440, "Team Fortress 2", { playtimeForever: 200, lastPlayed: 86400 })]);
    assert.deepEqual(store.getGame(440), {
      appid: 440,
      name: "Team Fortress 2",
      playtimeForever: 200,
      lastPlayed: 86400,
      installed: true
    });
    assert.equal(store.getGameInfo(440).playtime, "3h 20m");
    assert.equal(store.getGameInfo(440).lastPlayed, "1970-01-02 00:00:00");
  } finally {
    store.close();
    cleanup();
  }
});

test("open reads a database created earlier", () => {
  const { settings, cleanup } = createSandbox();
  seedStore(settings, [game(620, "Portal 2")]).close();
  const store = LibraryStore.open(settings.databasePath);
  try {
    assert.equal(store.getGameInfo(620).name, "Portal 2");
    assert.equal(store.getGame(1), null);
  } finally {
    store.close();
    cleanup();
  }
});

test("parseSelectionLabel strips the status suffix", () => {
  assert.equal(parseSelectionLabel("Team Fortress 2 [Not installed]"), "Team Fortress 2");
  assert.equal(parseSelectionLabel("Portal 2 [Installed]"), "Portal 2");
  assert.equal(parseSelectionLabel("Strange [Brackets]"), "Strange [Brackets]");
});
