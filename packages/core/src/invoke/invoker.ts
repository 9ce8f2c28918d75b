import { promises as fs } from 'fs';
import path from 'path';
import {
  ProcessError,
  UsageError,
  functionLogicalId,
  isDirectory,
  isFile,
  withTempDir,
  type Config,
  type Logger,
} from '@lambdakit/shared';
import type { SamCli } from '@lambdakit/exec';
import type { ProjectLayout } from '../project/discovery';
import { buildSamTemplate, renderSamTemplate } from '../template/sam';

export const DEFAULT_EVENT_FILE = 'event.json';
export const DEFAULT_EVENT = { body: '{}' };

export interface InvokeResult {
  logicalId: string;
  eventFile: string;
  stdout: string;
  stderr: string;
}

/**
 * Runs one function through `sam local invoke` using a throwaway
 * single-function template.
 */
export class LocalInvoker {
  constructor(
    private readonly config: Config,
    private readonly layout: ProjectLayout,
    private readonly sam: SamCli,
    private readonly logger: Logger,
  ) {}

  async invoke(name: string, eventFile?: string): Promise<InvokeResult> {
    const functionDir = path.join(this.layout.lambdasDir, name);
    if (!(await isDirectory(functionDir))) {
      throw new UsageError(`Lambda function '${name}' not found`, { details: { path: functionDir } });
    }

    this.logger.info(`Invoking Lambda function locally: ${name}`);
    const logicalId = functionLogicalId(name);

    return withTempDir('lambdakit-invoke-', async (tempDir): Promise<InvokeResult> => {
      const event = await this.resolveEvent(functionDir, tempDir, eventFile);

      const templatePath = path.join(tempDir, 'template.yaml');
      const template = buildSamTemplate(this.config, {
        functions: [name],
        includeLayer: false,
        codeUri: () => functionDir,
        minimal: true,
      });
      await fs.writeFile(templatePath, renderSamTemplate(template), 'utf8');

      const result = await this.sam.localInvoke(templatePath, logicalId, event);
      if (result.exitCode !== 0) {
        throw new ProcessError(`sam local invoke exited with code ${result.exitCode}`, {
          exitCode: result.exitCode,
          stdout: result.stdout,
          stderr: result.stderr,
        });
      }

      return { logicalId, eventFile: event, stdout: result.stdout, stderr: result.stderr };
    });
  }

  /**
   * The given file, then the same name inside the function directory, then the
   * function's event.json, then a generated default event.
   */
  private async resolveEvent(functionDir: string, tempDir: string, requested?: string): Promise<string> {
    if (requested) {
      const candidates = [path.resolve(this.layout.root, requested), path.join(functionDir, requested)];
      for (const candidate of candidates) {
        if (await isFile(candidate)) {
          return candidate;
        }
      }
      this.logger.warn(`Event file '${requested}' not found.`);
    }

    const defaultEvent = path.join(functionDir, DEFAULT_EVENT_FILE);
    if (await isFile(defaultEvent)) {
      this.logger.info(`Using default event file: ${defaultEvent}`);
      return defaultEvent;
    }

    const generated = path.join(tempDir, DEFAULT_EVENT_FILE);
    await fs.writeFile(generated, JSON.stringify(DEFAULT_EVENT), 'utf8');
    this.logger.info(`Created temporary event file: ${generated}`);
    return generated;
  }
}
