import path from 'node:path';
import type { Config } from '@lambdakit/shared';
import { isFile, listSubdirectories } from '@lambdakit/shared';

export const FUNCTION_ENTRY_FILE = 'app.py';

/**
 * Absolute locations of a project's inputs and outputs.
 */
export interface ProjectLayout {
  root: string;
  lambdasDir: string;
  libsDir: string;
  outputDir: string;
}

export interface ProjectEntry {
  name: string;
  path: string;
}

export function resolveLayout(root: string, config: Config): ProjectLayout {
  const absRoot = path.resolve(root);
  return {
    root: absRoot,
    lambdasDir: path.resolve(absRoot, config.paths.lambdas),
    libsDir: path.resolve(absRoot, config.paths.libs),
    outputDir: path.resolve(absRoot, config.paths.output),
  };
}

async function entriesContaining(dir: string, marker: string): Promise<ProjectEntry[]> {
  const found: ProjectEntry[] = [];
  for (const name of await listSubdirectories(dir)) {
    const entryPath = path.join(dir, name);
    if (await isFile(path.join(entryPath, marker))) {
      found.push({ name, path: entryPath });
    }
  }
  return found;
}

/**
 * Function directories: those containing the handler module.
 */
export function listFunctions(layout: ProjectLayout): Promise<ProjectEntry[]> {
  return entriesContaining(layout.lambdasDir, FUNCTION_ENTRY_FILE);
}

/**
 * Library directories: those containing a manifest.
 */
export function listLibraries(layout: ProjectLayout, manifestFile: string): Promise<ProjectEntry[]> {
  return entriesContaining(layout.libsDir, manifestFile);
}
