import { promises as fs } from 'fs';
import path from 'path';
import {
  UsageError,
  listSubdirectories,
  withTempDir,
  type Config,
  type Logger,
} from '@lambdakit/shared';
import { PythonBuildTool, UvInstaller, type ToolInvoker } from '@lambdakit/exec';
import type { ProjectLayout } from '../project/discovery';
import type { DependencySpecifier } from '../manifest/types';
import { collectDependencies, requirementLines } from './collector';
import { DependencyInstaller } from './installer';
import { LibraryPackager, type BuildArtifact, type LibraryCandidate } from './packager';
import { LayerAssembler } from './assembler';

export type LayerVariant = 'combined' | 'libs' | 'deps';

interface VariantShape {
  includeLibs: boolean;
  includeDeps: boolean;
  zipBasename: string;
}

export const LAYER_VARIANTS: Record<LayerVariant, VariantShape> = {
  combined: { includeLibs: true, includeDeps: true, zipBasename: 'combined-layer' },
  libs: { includeLibs: true, includeDeps: false, zipBasename: 'libs-layer' },
  deps: { includeLibs: false, includeDeps: true, zipBasename: 'deps-layer' },
};

export interface LayerSelection {
  libs: boolean;
  deps: boolean;
  combined: boolean;
}

/**
 * Which layers a `build-layer` invocation produces.
 */
export function planLayers(selection: LayerSelection): LayerVariant[] {
  if (selection.libs && selection.deps) {
    return selection.combined ? ['combined'] : ['libs', 'deps'];
  }
  if (selection.libs) {
    return ['libs'];
  }
  if (selection.deps) {
    return ['deps'];
  }
  throw new UsageError('Nothing to build: both libraries and dependencies are excluded');
}

export interface LayerBuildRequest {
  variant: LayerVariant;
  /** Produce the zip archive (default true) */
  zip?: boolean;
  /** Overrides the variant's zip basename */
  zipName?: string;
}

export interface LayerBuildResult {
  layerName: LayerVariant;
  outputPath: string;
  zipPath?: string;
  /** Third-party specifiers that were installed */
  dependencies: DependencySpecifier[];
  artifacts: BuildArtifact[];
}

export interface LayerBuilderOptions {
  config: Config;
  layout: ProjectLayout;
  invoker: ToolInvoker;
  logger: Logger;
}

/**
 * Runs the layer pipeline: collect, install dependencies, package libraries,
 * assemble. Work happens in a temporary staging root that is always removed.
 */
export class LayerBuilder {
  private readonly config: Config;
  private readonly layout: ProjectLayout;
  private readonly logger: Logger;
  private readonly installer: DependencyInstaller;
  private readonly packager: LibraryPackager;
  private readonly assembler: LayerAssembler;

  constructor(options: LayerBuilderOptions) {
    this.config = options.config;
    this.layout = options.layout;
    this.logger = options.logger;

    const uv = new UvInstaller(options.invoker, this.config.tools.uv);
    this.installer = new DependencyInstaller(uv, this.logger);
    this.packager = new LibraryPackager({
      buildTool: new PythonBuildTool(options.invoker, this.config.tools.python),
      installer: uv,
      internalMarker: this.config.layer.internalMarker,
      logger: this.logger,
    });
    this.assembler = new LayerAssembler(this.config.layer.runtimeRoot, this.logger);
  }

  async build(request: LayerBuildRequest): Promise<LayerBuildResult> {
    const { variant } = request;
    const shape = LAYER_VARIANTS[variant];
    const layer = this.config.layer;

    this.logger.info(`Building ${variant} layer`);

    const collected = await collectDependencies(this.layout.libsDir, {
      manifestFile: layer.manifestFile,
      localPrefix: layer.localPrefix,
      logger: this.logger,
    });
    const dependencies = shape.includeDeps ? collected.specifiers : [];

    return withTempDir(`lambdakit-${variant}-`, async (tempDir): Promise<LayerBuildResult> => {
      const stagingRoot = path.join(tempDir, layer.runtimeRoot);
      await fs.mkdir(stagingRoot, { recursive: true });

      if (shape.includeDeps) {
        await this.installer.install(requirementLines(dependencies, layer.pinVersions), stagingRoot);
      }

      let artifacts: BuildArtifact[] = [];
      if (shape.includeLibs) {
        const buildable = new Set(collected.manifests.map((m) => m.name));
        const candidates: LibraryCandidate[] = (await listSubdirectories(this.layout.libsDir)).map(
          (name) => ({
            name,
            path: path.join(this.layout.libsDir, name),
            buildable: buildable.has(name),
          }),
        );
        artifacts = await this.packager.packageAll(candidates, stagingRoot);
      }

      const zip = request.zip ?? true;
      const assembled = await this.assembler.assemble(stagingRoot, this.layout.outputDir, variant, {
        zipBasename: zip ? (request.zipName ?? shape.zipBasename) : undefined,
      });

      return { layerName: variant, ...assembled, dependencies, artifacts };
    });
  }

  /**
   * Builds every planned layer in turn. With more than one layer, a custom zip
   * name gets the layer name appended.
   */
  async buildAll(
    variants: LayerVariant[],
    options: { zip?: boolean; zipName?: string } = {},
  ): Promise<LayerBuildResult[]> {
    const results: LayerBuildResult[] = [];
    for (const variant of variants) {
      const zipName =
        options.zipName && variants.length > 1 ? `${options.zipName}-${variant}` : options.zipName;
      results.push(await this.build({ variant, zip: options.zip, zipName }));
    }
    return results;
  }
}
