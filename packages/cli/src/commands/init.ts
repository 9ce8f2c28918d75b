import type { Command } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import { PROJECT_CONFIG_FILENAME } from '@lambdakit/core';
import { pathExists } from '@lambdakit/shared';
import { commandEnvironment, type CliContext } from '../context';

export const DEFAULT_PROJECT_CONFIG = `
# lambdakit project configuration
# Every key is optional; the values below are the defaults.

configVersion: 1

paths:
  # One directory per function, each with an app.py
  lambdas: lambdas
  # One directory per shared library, each with a pyproject.toml and src/
  libs: libs
  # Built functions and layers
  output: dist

runtime:
  pythonVersion: "3.13"
  # x86_64 or arm64
  architecture: x86_64

layer:
  # Directory name the Lambda runtime expects at the root of a layer
  runtimeRoot: python
  # Dependencies starting with this prefix are local libraries
  localPrefix: lib_
  # Source packages starting with this marker are not copied
  internalMarker: __
  manifestFile: pyproject.toml
  # Keep version constraints when installing dependencies
  pinVersions: false

functions:
  handler: app.handler
  memorySize: 256
  timeout: 30

tools:
  python: python
  uv: uv
  sam: sam
  pytest: pytest
`;

export function registerInitCommand(program: Command, context: CliContext) {
  program
    .command('init')
    .description(`Create a default ${PROJECT_CONFIG_FILENAME} in the current directory`)
    .option('-f, --force', 'Overwrite an existing file without asking')
    .action(async (options: { force?: boolean }) => {
      const { renderer } = commandEnvironment(program, context);
      const configPath = path.join(context.cwd, PROJECT_CONFIG_FILENAME);

      if ((await pathExists(configPath)) && !options.force) {
        renderer.log(`A ${PROJECT_CONFIG_FILENAME} file already exists.`);
        const overwrite = await context.ui.confirm('Do you want to overwrite it?', undefined, true);
        if (!overwrite) {
          renderer.log('Aborted.');
          return;
        }
      }

      await fs.writeFile(configPath, DEFAULT_PROJECT_CONFIG.trimStart());
      renderer.render({
        status: 'SUCCESS',
        summary: `Created ${PROJECT_CONFIG_FILENAME}`,
        artifacts: { Config: configPath },
        nextSteps: ["Run 'lambdakit doctor' to verify your setup."],
      });
    });
}
