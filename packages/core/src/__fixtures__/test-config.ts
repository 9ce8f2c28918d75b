import { promises as fs } from 'fs';
import * as os from 'os';
import path from 'path';
import { ConfigSchema, type Config, type ConfigInput } from '@lambdakit/shared';
import type { ToolHandler, ToolInvocation } from '@lambdakit/exec';
import { resolveLayout, type ProjectLayout } from '../project/discovery';

export function configForTest(overrides: ConfigInput = {}): Config {
  return ConfigSchema.parse(overrides);
}

export interface TestProject {
  root: string;
  layout: ProjectLayout;
  cleanup(): Promise<void>;
}

/**
 * Creates a project tree in a fresh temp directory. Keys are paths relative to
 * the project root; values are file contents.
 */
export async function createProject(
  files: Record<string, string>,
  config: Config = configForTest(),
): Promise<TestProject> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'lambdakit-project-'));
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
  return {
    root,
    layout: resolveLayout(root, config),
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}

function argAfter(invocation: ToolInvocation, flag: string): string {
  const index = invocation.args.indexOf(flag);
  const value = index >= 0 ? invocation.args[index + 1] : undefined;
  if (value === undefined) {
    throw new Error(`${flag} missing from ${invocation.args.join(' ')}`);
  }
  return value;
}

export interface FakePythonToolsOptions {
  /** Library source dirs whose build exits non-zero */
  failBuildFor?: string[];
  /** Exit code of `uv pip install -r` */
  requirementsExitCode?: number;
  /** Exit code of `uv pip install <wheel>` */
  wheelInstallExitCode?: number;
}

/**
 * Handler imitating `python -m build` and `uv pip install --target`.
 * A build writes `<lib>-0.1.0-py3-none-any.whl` into its outdir. Installing a wheel
 * creates `<target>/<lib>/__init__.py`; installing requirements creates one
 * package directory per requirement name.
 */
export function fakePythonTools(options: FakePythonToolsOptions = {}): ToolHandler {
  return async (invocation) => {
    const { args } = invocation;

    if (args[0] === '-m' && args[1] === 'build') {
      const sourceDir = args[args.length - 1];
      const name = path.basename(sourceDir);
      if (options.failBuildFor?.includes(name)) {
        return { exitCode: 1, stderr: 'ERROR Backend subprocess exited' };
      }
      const outDir = argAfter(invocation, '--outdir');
      await fs.writeFile(path.join(outDir, `${name}-0.1.0-py3-none-any.whl`), 'wheel');
      return {};
    }

    if (args[0] === 'pip' && args[1] === 'install') {
      const target = argAfter(invocation, '--target');
      if (args.includes('-r')) {
        if (options.requirementsExitCode) {
          return { exitCode: options.requirementsExitCode, stderr: 'No solution found' };
        }
        const lines = (await fs.readFile(argAfter(invocation, '-r'), 'utf8')).split('\n');
        for (const line of lines.filter(Boolean)) {
          const pkg = line.split(/[<>=!~]/)[0];
          await fs.mkdir(path.join(target, pkg), { recursive: true });
          await fs.writeFile(path.join(target, pkg, '__init__.py'), '');
        }
        return {};
      }
      if (options.wheelInstallExitCode) {
        return { exitCode: options.wheelInstallExitCode, stderr: 'invalid wheel' };
      }
      const wheel = path.basename(args[args.length - 1]);
      const pkg = wheel.split('-')[0];
      await fs.mkdir(path.join(target, pkg), { recursive: true });
      await fs.writeFile(path.join(target, pkg, '__init__.py'), `# ${wheel}\n`);
      return {};
    }

    return { exitCode: 127, stderr: `unexpected ${invocation.command}` };
  };
}
