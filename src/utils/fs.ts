import { existsSync } from "node:fs";
import { copyFile, mkdir, readdir, rename, rm } from "node:fs/promises";
import { basename, join } from "node:path";
import debug from "debug";
import micromatch from "micromatch";

const log = debug("distrun:fs");

/**
 * Delete the regular files directly inside `dir` whose names match any of
 * `patterns`. Returns the removed names; an empty list when nothing matched.
 */
export async function removeMatching(
  dir: string,
  patterns: readonly string[]
): Promise<string[]> {
  if (patterns.length === 0) {
    return [];
  }

  const entries = await readdir(dir, { withFileTypes: true });
  const files = entries.filter((e) => e.isFile()).map((e) => e.name);
  const matches = micromatch(files, [...patterns]).sort();

  for (const name of matches) {
    log("Removing file %s", name);
    await rm(join(dir, name), { force: true });
  }
  return matches;
}

/**
 * Recursively remove each named directory under `dir`. Missing ones are
 * skipped. Returns the names that existed.
 */
export async function removeDirectories(
  dir: string,
  names: readonly string[]
): Promise<string[]> {
  const removed: string[] = [];
  for (const name of names) {
    const target = join(dir, name);
    if (!existsSync(target)) {
      continue;
    }
    log("Removing directory %s", target);
    await rm(target, { force: true, recursive: true });
    removed.push(name);
  }
  return removed;
}

/**
 * Move `path` into the backup slot, replacing whatever backup was there.
 * Only one generation is kept.
 */
export async function rotate(path: string, backupPath: string): Promise<boolean> {
  if (!existsSync(path)) {
    return false;
  }
  log("Rotating %s -> %s", path, backupPath);
  await rename(path, backupPath);
  return true;
}

/**
 * Create `path`, hand it to `fn`, and remove it afterwards whether `fn`
 * resolves or throws.
 */
export async function withStagingDirectory<T>(
  path: string,
  fn: (dir: string) => Promise<T>
): Promise<T> {
  await mkdir(path);
  log("Created staging directory %s", path);
  try {
    return await fn(path);
  } finally {
    await rm(path, { force: true, recursive: true });
    log("Removed staging directory %s", path);
  }
}

export type MissingSource = { entry: string; cause: unknown };

/**
 * Copy each manifest entry into `destDir` under its base name, in order.
 * Stops at the first entry that does not exist and reports it; copies made
 * before that point stay in `destDir`.
 */
export async function copyArtifacts(
  cwd: string,
  manifest: readonly string[],
  destDir: string
): Promise<MissingSource | undefined> {
  for (const entry of manifest) {
    try {
      await copyFile(join(cwd, entry), join(destDir, basename(entry)));
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return { cause: error, entry };
      }
      throw error;
    }
    log("Copied %s", entry);
  }
  return undefined;
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
