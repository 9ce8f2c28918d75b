import path from 'node:path';
import {
  BuildError,
  InstallError,
  IoError,
  errorMessage,
  isDirectory,
  listSubdirectories,
  copyTree,
  withTempDir,
  type Logger,
} from '@lambdakit/shared';
import type { PythonBuildTool, UvInstaller } from '@lambdakit/exec';

export type ArtifactKind = 'wheel' | 'source-copy';

/**
 * What packaging one library put into the install root.
 */
export interface BuildArtifact {
  libraryName: string;
  kind: ArtifactKind;
  /** The built wheel (already discarded with its temp dir) or the library's `src` directory */
  location: string;
  /** Wheel file names installed, or package directories copied */
  contents: string[];
}

export interface LibraryCandidate {
  name: string;
  path: string;
  /** Has a usable manifest, so a wheel build is attempted first */
  buildable: boolean;
}

export interface LibraryPackagerOptions {
  buildTool: PythonBuildTool;
  installer: UvInstaller;
  /** Source directories starting with this marker are never copied */
  internalMarker: string;
  logger: Logger;
}

export const SOURCE_DIR = 'src';

/**
 * Puts each shared library into the install root: built wheel first, raw
 * source packages when the build or install fails.
 */
export class LibraryPackager {
  private readonly logger: Logger;

  constructor(private readonly options: LibraryPackagerOptions) {
    this.logger = options.logger;
  }

  async packageAll(libraries: LibraryCandidate[], installRoot: string): Promise<BuildArtifact[]> {
    const artifacts: BuildArtifact[] = [];
    for (const library of libraries) {
      const artifact = await this.packageLibrary(library, installRoot);
      if (artifact) {
        artifacts.push(artifact);
      }
    }
    return artifacts;
  }

  async packageLibrary(
    library: LibraryCandidate,
    installRoot: string,
  ): Promise<BuildArtifact | undefined> {
    const log = this.logger.child({ library: library.name });

    if (library.buildable) {
      try {
        return await this.installWheel(library, installRoot, log);
      } catch (error: unknown) {
        log.warn(`${errorMessage(error)}; falling back to source copy`);
      }
    }

    return this.copySources(library, installRoot, log);
  }

  private async installWheel(
    library: LibraryCandidate,
    installRoot: string,
    log: Logger,
  ): Promise<BuildArtifact> {
    const { buildTool, installer } = this.options;

    return withTempDir(`lambdakit-${library.name}-`, async (outDir): Promise<BuildArtifact> => {
      const built = await buildTool.buildWheel(library.path, outDir);
      if (!built.ok) {
        throw new BuildError(`Building ${library.name} failed: ${built.reason}`, {
          details: { stderr: built.result.stderr.trim() },
        });
      }

      for (const wheel of built.wheels) {
        const result = await installer.installArtifact(wheel, installRoot, { noDeps: true });
        if (result.exitCode !== 0) {
          throw new InstallError(
            `Installing ${path.basename(wheel)} failed: installer exited with code ${result.exitCode}`,
            { details: { stderr: result.stderr.trim() } },
          );
        }
      }

      log.info(`Installed ${library.name} from wheel`);
      return {
        libraryName: library.name,
        kind: 'wheel',
        location: built.wheels[0],
        contents: built.wheels.map((w) => path.basename(w)),
      };
    });
  }

  private async copySources(
    library: LibraryCandidate,
    installRoot: string,
    log: Logger,
  ): Promise<BuildArtifact | undefined> {
    const srcDir = path.join(library.path, SOURCE_DIR);
    if (!(await isDirectory(srcDir))) {
      log.debug(`No ${SOURCE_DIR} directory; nothing to package`);
      return undefined;
    }

    const packages = (await listSubdirectories(srcDir)).filter(
      (name) => !name.startsWith(this.options.internalMarker),
    );

    for (const name of packages) {
      try {
        await copyTree(path.join(srcDir, name), path.join(installRoot, name));
      } catch (error: unknown) {
        throw new IoError(`Copying ${library.name}/${name}`, errorMessage(error), { cause: error });
      }
    }

    log.info(`Copied ${library.name} sources`);
    return { libraryName: library.name, kind: 'source-copy', location: srcDir, contents: packages };
  }
}
