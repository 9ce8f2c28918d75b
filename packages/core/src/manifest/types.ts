/**
 * A package requirement: bare name plus an optional version constraint.
 * Two specifiers with the same `name` are duplicates.
 */
export interface DependencySpecifier {
  name: string;
  /** Everything from the constraint operator on, e.g. `>=2.6.1` */
  constraint?: string;
  /** Requirement line that keeps the constraint, e.g. `pydantic>=2.6.1` */
  requirement: string;
}

/**
 * Where the dependency list was found in the manifest.
 * - `inline-list`: `dependencies = ["a>=1", "b"]`
 * - `legacy-section`: a `[project.dependencies]` table with one key per package
 * - `none`: no dependency declaration at all
 */
export type ManifestLayout = 'inline-list' | 'legacy-section' | 'none';

/**
 * One shared library, identified by its directory name.
 */
export interface LibraryManifest {
  name: string;
  /** Library directory */
  root: string;
  manifestPath: string;
  /** `project.name`, when declared */
  projectName?: string;
  /** `project.version`, when declared */
  version?: string;
  layout: ManifestLayout;
  dependencies: DependencySpecifier[];
}
