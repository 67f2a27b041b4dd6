import fs from "node:fs";
import path from "node:path";

export type InstallDirReport = {
  exists: boolean;
  totalFiles: number;
  shallowFiles: number;
};

// Files directly in the install dir (depth 0) or one folder down (depth 1) count as shallow.
const SHALLOW_DEPTH = 1;

export function inspectInstallDir(dir: string): InstallDirReport {
  const report: InstallDirReport = { exists: isDirectory(dir), totalFiles: 0, shallowFiles: 0 };
  if (!report.exists) return report;
  walk(dir, 0, (_, depth) => {
    report.totalFiles++;
    if (depth <= SHALLOW_DEPTH) report.shallowFiles++;
  });
  return report;
}

export function isValidInstallDir(report: InstallDirReport): boolean {
  return report.exists && report.shallowFiles > 0;
}

export function directorySize(dir: string): number {
  let total = 0;
  walk(dir, 0, (filePath) => {
    try {
      total += fs.statSync(filePath).size;
    } catch {
      // vanished between readdir and stat
    }
  });
  return total;
}

export function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

function walk(dir: string, depth: number, onFile: (filePath: string, depth: number) => void): void {
  const entries = safeReadDir(dir);
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      walk(full, depth + 1, onFile);
    } else if (entry.isFile()) {
      onFile(full, depth);
    }
  }
}

function safeReadDir(dir: string): fs.Dirent[] {
  try {
    return fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    return [];
  }
}
