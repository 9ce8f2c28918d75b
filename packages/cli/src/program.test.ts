import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import path from 'path';
import { ScriptedToolInvoker, type ToolHandler } from '@lambdakit/exec';
import { RecordingLogger } from '@lambdakit/shared';
import type { CliContext } from './context';
import { runCli } from './program';
import { DEFAULT_PROJECT_CONFIG } from './commands/init';

describe('lambdakit CLI', () => {
  let root: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'lambdakit-cli-'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  async function writeFiles(files: Record<string, string>) {
    for (const [relative, content] of Object.entries(files)) {
      await fs.mkdir(path.dirname(path.join(root, relative)), { recursive: true });
      await fs.writeFile(path.join(root, relative), content);
    }
  }

  function context(handler?: ToolHandler, confirmed = false): CliContext & { invoker: ScriptedToolInvoker } {
    return {
      cwd: root,
      invoker: new ScriptedToolInvoker(handler),
      ui: { confirm: vi.fn(async () => confirmed) },
      logger: new RecordingLogger(),
      env: {},
    };
  }

  const run = (args: string[], ctx: CliContext) => runCli(['node', 'lambdakit', ...args], ctx);
  const logged = () => logSpy.mock.calls.map((c) => String(c[0])).join('\n');
  const errored = () => errSpy.mock.calls.map((c) => String(c[0])).join('\n');
  const jsonOutput = (): unknown => JSON.parse(String(logSpy.mock.calls[0][0]));

  it('lists libraries with a manifest as JSON', async () => {
    await writeFiles({
      'libs/lib_common/pyproject.toml': '',
      'libs/lib_scratch/src/lib_scratch/__init__.py': '',
    });

    const code = await run(['--json', 'list-libs'], context());

    expect(code).toBe(0);
    expect(jsonOutput()).toEqual([{ Name: 'lib_common', Path: 'libs/lib_common' }]);
  });

  it('says so when there are no functions', async () => {
    expect(await run(['list-lambdas'], context())).toBe(0);
    expect(logged()).toContain('No Lambda functions found.');
  });

  it('builds the combined layer, falling back to sources when the wheel build fails', async () => {
    await writeFiles({
      'libs/lib_common/pyproject.toml': '[project]\ndependencies = ["pydantic>=2.6.1", "lib_utils"]\n',
      'libs/lib_common/src/lib_common/__init__.py': 'X = 1\n',
    });
    const ctx = context((inv) => ({ exitCode: inv.args[1] === 'build' ? 1 : 0 }));

    const code = await run(['--json', 'build-layer'], ctx);

    expect(code).toBe(0);
    const layerDir = path.join(root, 'dist', 'layers', 'combined');
    expect(jsonOutput()).toMatchObject({
      status: 'SUCCESS',
      summary: 'Built combined layer',
      layer: {
        layerName: 'combined',
        outputPath: layerDir,
        zipPath: path.join(root, 'dist', 'layers', 'combined-layer.zip'),
        dependencies: [{ name: 'pydantic', constraint: '>=2.6.1', requirement: 'pydantic>=2.6.1' }],
        artifacts: [{ libraryName: 'lib_common', kind: 'source-copy', contents: ['lib_common'] }],
      },
    });
    expect(await fs.readFile(path.join(layerDir, 'python', 'lib_common', '__init__.py'), 'utf8')).toBe(
      'X = 1\n',
    );
    expect(ctx.invoker.commandLines().filter((l) => l.includes(' -r '))).toHaveLength(1);
  });

  it('exits 2 with a JSON error when both parts of the layer are excluded', async () => {
    const code = await run(['--json', 'build-layer', '--no-libs', '--no-deps'], context());

    expect(code).toBe(2);
    expect(jsonOutput()).toEqual({
      error: {
        code: 'UsageError',
        message: 'Nothing to build: both libraries and dependencies are excluded',
      },
    });
  });

  it('exits 2 for an unknown function', async () => {
    const code = await run(['build-lambda', 'missing'], context());

    expect(code).toBe(2);
    expect(errored()).toContain("❌ Error: Lambda function 'missing' not found");
  });

  it('builds a function archive', async () => {
    await writeFiles({ 'lambdas/hello_world/app.py': 'def handler(e, c):\n    return e\n' });

    const code = await run(['--json', 'build-lambda', 'hello_world'], context());

    expect(code).toBe(0);
    expect(jsonOutput()).toMatchObject({
      function: {
        name: 'hello_world',
        zipPath: path.join(root, 'dist', 'lambdas', 'hello_world', 'hello_world.zip'),
        files: ['app.py'],
      },
    });
  });

  it('lets --output-dir override the configured output directory', async () => {
    await writeFiles({
      'lambdakit.yaml': 'paths:\n  output: from-config\n',
      'lambdas/hello_world/app.py': '',
    });

    const code = await run(['--json', '--output-dir', 'build', 'build-lambda', 'hello_world'], context());

    expect(code).toBe(0);
    expect(jsonOutput()).toMatchObject({
      function: { zipPath: path.join(root, 'build', 'lambdas', 'hello_world', 'hello_world.zip') },
    });
    expect(await fs.readdir(root)).not.toContain('from-config');
  });

  it('reports a failed local invocation with the SAM output', async () => {
    await writeFiles({ 'lambdas/hello_world/app.py': '' });
    const ctx = context(() => ({ exitCode: 1, stderr: 'Error: boom\n', stdout: '' }));

    const code = await run(['invoke-local', 'hello_world'], ctx);

    expect(code).toBe(1);
    expect(errored()).toContain('❌ Error: sam local invoke exited with code 1');
    expect(errored()).toContain('Error: boom');
    expect(ctx.invoker.invocations[0].command).toBe('sam');
  });

  it('fails when any library test run fails', async () => {
    await writeFiles({
      'libs/lib_common/src/lib_common/__init__.py': '',
      'libs/lib_common/tests/test_common.py': '',
    });
    const ctx = context(() => ({ exitCode: 1 }));

    const code = await run(['--json', 'test', 'lib_common', '-v'], ctx);

    expect(code).toBe(1);
    expect(jsonOutput()).toEqual({
      error: { code: 'ProcessError', message: 'Some tests failed.', details: { failed: ['lib_common'] } },
    });
    expect(ctx.invoker.invocations[0].args[0]).toBe('-v');
  });

  it('writes a SAM template for selected functions', async () => {
    await writeFiles({
      'lambdas/hello_world/app.py': '',
      'lambdas/data_processor/app.py': '',
    });

    const code = await run(
      ['generate-sam-template', '-o', 'sam.yaml', '-l', 'hello_world', '--no-layer'],
      context(),
    );

    expect(code).toBe(0);
    const text = await fs.readFile(path.join(root, 'sam.yaml'), 'utf8');
    expect(text).toContain('helloworldFunction:');
    expect(text).not.toContain('dataprocessorFunction');
    expect(text).not.toContain('SharedLibsLayer');
  });

  it('creates the project configuration', async () => {
    const code = await run(['init'], context());

    expect(code).toBe(0);
    expect(await fs.readFile(path.join(root, 'lambdakit.yaml'), 'utf8')).toBe(
      DEFAULT_PROJECT_CONFIG.trimStart(),
    );
  });

  it('keeps an existing configuration unless confirmed or forced', async () => {
    await writeFiles({ 'lambdakit.yaml': 'configVersion: 1\n' });
    const declined = context(undefined, false);

    expect(await run(['init'], declined)).toBe(0);
    expect(declined.ui.confirm).toHaveBeenCalledTimes(1);
    expect(await fs.readFile(path.join(root, 'lambdakit.yaml'), 'utf8')).toBe('configVersion: 1\n');

    const forced = context(undefined, false);
    expect(await run(['init', '--force'], forced)).toBe(0);
    expect(forced.ui.confirm).not.toHaveBeenCalled();
    expect(await fs.readFile(path.join(root, 'lambdakit.yaml'), 'utf8')).toBe(
      DEFAULT_PROJECT_CONFIG.trimStart(),
    );
  });

  it('exits 2 for configuration errors', async () => {
    await writeFiles({ 'lambdakit.yaml': 'functions:\n  memorySize: 64\n' });

    const code = await run(['--json', 'list-lambdas'], context());

    expect(code).toBe(2);
    expect(jsonOutput()).toMatchObject({ error: { code: 'ConfigError' } });
  });

  it('exits 2 for an unknown command', async () => {
    expect(await run(['deploy'], context())).toBe(2);
  });
});
