import path from 'node:path';
import { ManifestError, listSubdirectories, type Logger } from '@lambdakit/shared';
import { readManifest } from '../manifest/parser';
import type { DependencySpecifier, LibraryManifest } from '../manifest/types';

export interface SkippedLibrary {
  name: string;
  reason: string;
}

export interface CollectedDependencies {
  /** Third-party specifiers, first occurrence of each bare name, in discovery order */
  specifiers: DependencySpecifier[];
  /** Libraries whose manifest parsed */
  manifests: LibraryManifest[];
  /** Libraries whose manifest could not be used */
  skipped: SkippedLibrary[];
}

export interface CollectOptions {
  manifestFile: string;
  /** Names starting with this prefix are local libraries, never installed from an index */
  localPrefix: string;
  logger: Logger;
}

/**
 * Reads every library manifest under `libsDir` and merges the declared
 * dependencies by bare package name. Libraries without a manifest contribute
 * nothing; malformed manifests are logged and skipped.
 */
export async function collectDependencies(
  libsDir: string,
  options: CollectOptions,
): Promise<CollectedDependencies> {
  const { manifestFile, localPrefix, logger } = options;
  const byName = new Map<string, DependencySpecifier>();
  const manifests: LibraryManifest[] = [];
  const skipped: SkippedLibrary[] = [];

  for (const name of await listSubdirectories(libsDir)) {
    let manifest: LibraryManifest | undefined;
    try {
      manifest = await readManifest(path.join(libsDir, name), manifestFile);
    } catch (error: unknown) {
      if (!(error instanceof ManifestError)) {
        throw error;
      }
      logger.warn(`Skipping dependencies of ${name}: ${error.message}`);
      skipped.push({ name, reason: error.message });
      continue;
    }

    if (!manifest) {
      logger.debug(`${name} has no ${manifestFile}`);
      continue;
    }

    manifests.push(manifest);
    for (const specifier of manifest.dependencies) {
      if (specifier.name.startsWith(localPrefix)) {
        continue;
      }
      if (!byName.has(specifier.name)) {
        byName.set(specifier.name, specifier);
      }
    }
  }

  return { specifiers: [...byName.values()], manifests, skipped };
}

/**
 * Lines for the requirements file: bare names, or full requirements when pinning.
 */
export function requirementLines(specifiers: DependencySpecifier[], pinVersions: boolean): string[] {
  return specifiers.map((s) => (pinVersions ? s.requirement : s.name));
}
