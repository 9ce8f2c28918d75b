import { promises as fs } from 'fs';
import path from 'path';
import {
  IoError,
  UsageError,
  errorMessage,
  isDirectory,
  listFiles,
  type Logger,
} from '@lambdakit/shared';
import type { ProjectLayout } from '../project/discovery';
import { writeZip, type ZipInput } from '../archive/zip';

export interface FunctionBuildResult {
  name: string;
  outputPath: string;
  zipPath: string;
  files: string[];
}

/**
 * Packages one function: its top-level Python modules, copied and zipped.
 */
export class FunctionBuilder {
  constructor(
    private readonly layout: ProjectLayout,
    private readonly logger: Logger,
  ) {}

  async build(name: string): Promise<FunctionBuildResult> {
    const sourceDir = path.join(this.layout.lambdasDir, name);
    if (!(await isDirectory(sourceDir))) {
      throw new UsageError(`Lambda function '${name}' not found`, { details: { path: sourceDir } });
    }

    const outputPath = path.join(this.layout.outputDir, 'lambdas', name);
    const files = await listFiles(sourceDir, '.py');

    try {
      await fs.mkdir(outputPath, { recursive: true });
      for (const file of files) {
        await fs.copyFile(path.join(sourceDir, file), path.join(outputPath, file));
      }
    } catch (error: unknown) {
      throw new IoError(`Copying function ${name}`, errorMessage(error), { cause: error });
    }

    const zipPath = await writeZip(
      path.join(outputPath, `${name}.zip`),
      files.map((file): ZipInput => ({ kind: 'file', path: path.join(outputPath, file), name: file })),
    );

    this.logger.info(`Built ${name} (${files.length} files) into ${outputPath}`);
    return { name, outputPath, zipPath, files };
  }
}
