import fs from "fs-extra";
import path from "node:path";
import { DEFAULT_SPEC_TEMPLATE, PROJECT_CONFIG_FILENAME } from "./config.js";

const ROOT_MARKERS = [PROJECT_CONFIG_FILENAME, DEFAULT_SPEC_TEMPLATE];

/**
 * Root used when the working tree is not under git: the nearest ancestor
 * holding a project config or the default spec template, else `startDir`.
 */
export async function resolveFallbackRoot(startDir?: string): Promise<string> {
  const start = path.resolve(startDir || process.cwd());
  let current = start;

  while (true) {
    for (const marker of ROOT_MARKERS) {
      if (await fs.pathExists(path.join(current, marker))) {
        return current;
      }
    }
    const parent = path.dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  return start;
}

/** Names of the immediate subdirectories of `dir`, following symlinks. */
export async function listFeatureDirectories(dir: string): Promise<string[]> {
  if (!(await fs.pathExists(dir))) {
    return [];
  }
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const names: string[] = [];
  for (const entry of entries) {
    if (entry.isDirectory()) {
      names.push(entry.name);
    } else if (entry.isSymbolicLink()) {
      const stats = await fs.stat(path.join(dir, entry.name)).catch(() => null);
      if (stats?.isDirectory()) {
        names.push(entry.name);
      }
    }
  }
  return names.sort((a, b) => a.localeCompare(b));
}
