import { existsSync, mkdirSync, readdirSync, readFileSync, statSync } from 'fs';
import { join } from 'path';

export interface FileEntry {
  path: string;
  name: string;
  modifiedMs: number;
}

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export function ensureDirSync(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Read file content, returns null if the file is missing or unreadable
 */
export function readFileSafe(filePath: string): string | null {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch {
    return null;
  }
}

/**
 * Files directly inside `dirPath` whose name matches `pattern`, newest first.
 * A missing directory yields an empty list.
 */
export function listFilesByMtime(dirPath: string, pattern: RegExp): FileEntry[] {
  if (!existsSync(dirPath)) return [];

  const entries: FileEntry[] = [];
  for (const name of readdirSync(dirPath)) {
    if (!pattern.test(name)) continue;
    const path = join(dirPath, name);
    const stats = statSync(path);
    if (!stats.isFile()) continue;
    entries.push({ path, name, modifiedMs: stats.mtimeMs });
  }
  return entries.sort((a, b) => b.modifiedMs - a.modifiedMs);
}
