import { mkdir, readdir, rm, stat } from "node:fs/promises";
import path from "node:path";

export async function ensureDir(directory: string): Promise<void> {
  await mkdir(directory, { recursive: true });
}

export async function removeFileSafe(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

export async function fileSize(filePath: string): Promise<number> {
  const info = await stat(filePath);
  return info.size;
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

async function listFiles(directory: string): Promise<string[]> {
  try {
    return await readdir(directory);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }
}

/** Removes every file in `directory` whose name starts with `prefix`. */
export async function removeByPrefix(
  directory: string,
  prefix: string,
): Promise<string[]> {
  const names = await listFiles(directory);
  const matched = names.filter((name) => name.startsWith(prefix));
  await Promise.all(
    matched.map((name) => removeFileSafe(path.join(directory, name))),
  );
  return matched;
}

/** Removes files older than `maxAgeMs`, leaving names under `keepPrefixes` alone. */
export async function cleanupStaleFiles(
  directory: string,
  maxAgeMs: number,
  now: number = Date.now(),
  keepPrefixes: readonly string[] = [],
): Promise<string[]> {
  const removed: string[] = [];

  for (const name of await listFiles(directory)) {
    if (name === ".gitkeep" || keepPrefixes.some((prefix) => name.startsWith(prefix))) {
      continue;
    }

    const filePath = path.join(directory, name);
    const info = await stat(filePath).catch(() => null);
    if (!info || !info.isFile()) {
      continue;
    }

    if (now - info.mtimeMs > maxAgeMs) {
      await removeFileSafe(filePath);
      removed.push(name);
    }
  }

  return removed;
}
