import { promises as fs } from 'fs';
import path from 'path';
import { IoError, copyContents, errorMessage, type Logger } from '@lambdakit/shared';
import { writeZip } from '../archive/zip';

export interface AssembledLayer {
  /** `<output>/layers/<layer>` */
  outputPath: string;
  zipPath?: string;
}

export interface AssembleOptions {
  /** Write `<output>/layers/<zipBasename>.zip`, beside the layer directory */
  zipBasename?: string;
}

/**
 * Copies a staging root into `<output>/layers/<layer>/<runtimeRoot>` and archives it.
 * Existing output is merged, not replaced. The layer directory holds only the
 * runtime root, so it can be deployed as it is.
 */
export class LayerAssembler {
  constructor(
    private readonly runtimeRoot: string,
    private readonly logger: Logger,
  ) {}

  async assemble(
    stagingRoot: string,
    outputDir: string,
    layerName: string,
    options: AssembleOptions = {},
  ): Promise<AssembledLayer> {
    const outputPath = path.join(outputDir, 'layers', layerName);
    const targetRoot = path.join(outputPath, this.runtimeRoot);

    try {
      await fs.mkdir(stagingRoot, { recursive: true });
      await copyContents(stagingRoot, targetRoot);
    } catch (error: unknown) {
      throw new IoError(`Copying layer ${layerName}`, errorMessage(error), {
        cause: error,
        details: { from: stagingRoot, to: targetRoot },
      });
    }
    this.logger.info(`Layer ${layerName} written to ${outputPath}`);

    if (!options.zipBasename) {
      return { outputPath };
    }

    const zipPath = await writeZip(path.join(outputDir, 'layers', `${options.zipBasename}.zip`), [
      { kind: 'directory', path: targetRoot, prefix: this.runtimeRoot },
    ]);
    this.logger.info(`Layer archive written to ${zipPath}`);
    return { outputPath, zipPath };
  }
}
