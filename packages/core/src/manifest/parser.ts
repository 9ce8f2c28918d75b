import { promises as fs } from 'fs';
import path from 'path';
import { parse, TomlError } from 'smol-toml';
import { ManifestError, errorMessage, isErrnoException } from '@lambdakit/shared';
import type { DependencySpecifier, LibraryManifest, ManifestLayout } from './types';

type TomlRecord = Record<string, unknown>;

function isTable(value: unknown): value is TomlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function stripQuotes(text: string): string {
  return text.replace(/^["']+|["']+$/g, '');
}

/**
 * Splits one dependency entry into name and constraint.
 *
 * The entry is trimmed and stripped of surrounding quotes, then split at the first
 * `>=`, or failing that at the first `=`. Other operators stay part of the name.
 * Returns undefined for entries with an empty name.
 */
export function parseSpecifier(entry: string): DependencySpecifier | undefined {
  const text = stripQuotes(entry.trim()).trim();

  let splitAt = text.indexOf('>=');
  if (splitAt < 0) {
    splitAt = text.indexOf('=');
  }

  if (splitAt < 0) {
    return text ? { name: text, requirement: text } : undefined;
  }

  const name = text.slice(0, splitAt).trim();
  if (!name) {
    return undefined;
  }
  const constraint = text.slice(splitAt).trim();
  return { name, constraint, requirement: `${name}${constraint}` };
}

/**
 * Specifier for a `[project.dependencies]` table entry (`name = "constraint"`).
 * A bare version becomes an exact pin; `*` or an empty string means any version.
 */
function legacySpecifier(key: string, value: string): DependencySpecifier | undefined {
  const name = stripQuotes(key.trim()).trim();
  if (!name) {
    return undefined;
  }
  const version = value.trim();
  if (!version || version === '*') {
    return { name, requirement: name };
  }
  const constraint = /^[<>=!~]/.test(version) ? version : `==${version}`;
  return { name, constraint, requirement: `${name}${constraint}` };
}

function readInlineList(libraryName: string, entries: unknown[]): DependencySpecifier[] {
  const specifiers: DependencySpecifier[] = [];
  for (const entry of entries) {
    if (typeof entry !== 'string') {
      throw new ManifestError(libraryName, `dependency entries must be strings, got ${typeof entry}`);
    }
    const specifier = parseSpecifier(entry);
    if (specifier) {
      specifiers.push(specifier);
    }
  }
  return specifiers;
}

function readLegacySection(libraryName: string, table: TomlRecord): DependencySpecifier[] {
  const specifiers: DependencySpecifier[] = [];
  for (const [key, value] of Object.entries(table)) {
    if (typeof value !== 'string') {
      throw new ManifestError(libraryName, `constraint for "${key}" must be a string`);
    }
    const specifier = legacySpecifier(key, value);
    if (specifier) {
      specifiers.push(specifier);
    }
  }
  return specifiers;
}

export interface ManifestSource {
  /** Library name, taken from its directory */
  name: string;
  root: string;
  manifestPath: string;
}

/**
 * Parses manifest text. The inline list wins over the legacy section when both
 * are present.
 */
export function parseManifest(text: string, source: ManifestSource): LibraryManifest {
  let doc: TomlRecord;
  try {
    doc = parse(text);
  } catch (error: unknown) {
    const detail = error instanceof TomlError ? error.message.split('\n')[0] : errorMessage(error);
    throw new ManifestError(source.name, `invalid TOML: ${detail}`, { cause: error });
  }

  const project = isTable(doc.project) ? doc.project : {};
  const projectDeps = project.dependencies;
  const rootDeps = doc.dependencies;

  let layout: ManifestLayout = 'none';
  let dependencies: DependencySpecifier[] = [];

  if (Array.isArray(projectDeps)) {
    layout = 'inline-list';
    dependencies = readInlineList(source.name, projectDeps);
  } else if (Array.isArray(rootDeps)) {
    layout = 'inline-list';
    dependencies = readInlineList(source.name, rootDeps);
  } else if (isTable(projectDeps)) {
    layout = 'legacy-section';
    dependencies = readLegacySection(source.name, projectDeps);
  } else if (projectDeps !== undefined) {
    throw new ManifestError(source.name, 'project.dependencies must be a list or a table');
  }

  return {
    name: source.name,
    root: source.root,
    manifestPath: source.manifestPath,
    projectName: typeof project.name === 'string' ? project.name : undefined,
    version: typeof project.version === 'string' ? project.version : undefined,
    layout,
    dependencies,
  };
}

/**
 * Reads `<libraryDir>/<manifestFile>`. Resolves undefined when the library has no
 * manifest; rejects with ManifestError when it cannot be read or parsed.
 */
export async function readManifest(
  libraryDir: string,
  manifestFile: string,
): Promise<LibraryManifest | undefined> {
  const name = path.basename(libraryDir);
  const manifestPath = path.join(libraryDir, manifestFile);

  let text: string;
  try {
    text = await fs.readFile(manifestPath, 'utf8');
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw new ManifestError(name, `cannot read ${manifestFile}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  return parseManifest(text, { name, root: libraryDir, manifestPath });
}
