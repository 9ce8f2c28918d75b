import { promises as fs, type Dirent } from 'fs';
import path, { dirname } from 'path';
import { tmpName, withDir } from 'tmp-promise';
import { copy, ensureDir as fseEnsureDir } from 'fs-extra';

/**
 * Ensures the parent directory of `filePath` exists.
 */
export async function ensureDir(filePath: string): Promise<void> {
  await fseEnsureDir(dirname(filePath));
}

export async function atomicWrite(filePath: string, content: string | Buffer): Promise<void> {
  await ensureDir(filePath);
  const tempPath = await tmpName({ dir: dirname(filePath) });
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, filePath);
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

export async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

/**
 * Names of the immediate subdirectories of `dir`, sorted.
 * A missing directory yields an empty list.
 */
export async function listSubdirectories(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
  return entries
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort();
}

/**
 * Names of the regular files directly inside `dir` ending with `extension`, sorted.
 */
export async function listFiles(dir: string, extension: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.endsWith(extension))
    .map((e) => e.name)
    .sort();
}

/**
 * Copies `src` (file or directory) to `dest`, merging into an existing directory
 * and overwriting files that already exist there.
 */
export async function copyTree(src: string, dest: string): Promise<void> {
  await copy(src, dest, { overwrite: true, errorOnExist: false });
}

/**
 * Copies every entry directly inside `srcDir` into `destDir`, merging.
 */
export async function copyContents(srcDir: string, destDir: string): Promise<string[]> {
  await fseEnsureDir(destDir);
  const names = (await fs.readdir(srcDir)).sort();
  for (const name of names) {
    await copyTree(path.join(srcDir, name), path.join(destDir, name));
  }
  return names;
}

/**
 * Runs `fn` with a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or rejects.
 */
export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  return withDir(async ({ path: dir }) => fn(dir), { prefix, unsafeCleanup: true });
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
