import { promises as fs } from 'fs';
import path from 'path';
import { DependencyInstallError, errorMessage, withTempDir, type Logger } from '@lambdakit/shared';
import type { ToolResult, UvInstaller } from '@lambdakit/exec';

export const REQUIREMENTS_FILE = 'requirements.txt';

/**
 * Installs third-party requirements into the install root in one installer run.
 * Any failure is fatal for the layer.
 */
export class DependencyInstaller {
  constructor(
    private readonly installer: UvInstaller,
    private readonly logger: Logger,
  ) {}

  async install(requirements: string[], installRoot: string): Promise<void> {
    if (requirements.length === 0) {
      this.logger.info('No third-party dependencies to install');
      return;
    }

    this.logger.info(`Installing ${requirements.length} dependencies`);

    await withTempDir('lambdakit-requirements-', async (dir) => {
      const requirementsFile = path.join(dir, REQUIREMENTS_FILE);
      await fs.writeFile(requirementsFile, `${requirements.join('\n')}\n`, 'utf8');

      let result: ToolResult;
      try {
        result = await this.installer.installRequirements(requirementsFile, installRoot);
      } catch (error: unknown) {
        throw new DependencyInstallError(errorMessage(error), { cause: error });
      }

      if (result.exitCode !== 0) {
        throw new DependencyInstallError(`installer exited with code ${result.exitCode}`, {
          details: { requirements, stderr: result.stderr.trim() },
        });
      }
    });
  }
}
