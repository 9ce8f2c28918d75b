import { describe, it, expect, afterEach } from 'vitest';
import path from 'path';
import { RecordingLogger, UsageError } from '@lambdakit/shared';
import { PytestRunner, ScriptedToolInvoker } from '@lambdakit/exec';
import { createProject, type TestProject } from '../__fixtures__/test-config';
import { LibraryTestRunner } from './runner';

describe('LibraryTestRunner', () => {
  let project: TestProject | undefined;

  afterEach(async () => {
    await project?.cleanup();
    project = undefined;
  });

  const files = {
    'libs/lib_common/src/lib_common/__init__.py': '',
    'libs/lib_common/tests/test_common.py': '',
    'libs/lib_utils/src/lib_utils/__init__.py': '',
    'libs/lib_utils/tests/test_utils.py': '',
    'libs/lib_docs/README.md': '',
  };

  async function setup(failFor: string[] = [], inherited?: string) {
    project = await createProject(files);
    const invoker = new ScriptedToolInvoker((inv) => ({
      exitCode: failFor.some((name) => inv.cwd?.endsWith(name)) ? 1 : 0,
    }));
    const logger = new RecordingLogger();
    const runner = new LibraryTestRunner(project.layout, new PytestRunner(invoker), logger, {
      PYTHONPATH: inherited,
    });
    return { project, invoker, logger, runner };
  }

  it('runs every library with all sources on PYTHONPATH', async () => {
    const { project, invoker, logger, runner } = await setup([], '/opt/site');
    const libs = project.layout.libsDir;

    const summary = await runner.run();

    expect(summary).toEqual({
      results: [
        { library: 'lib_common', exitCode: 0 },
        { library: 'lib_utils', exitCode: 0 },
      ],
      skipped: ['lib_docs'],
      passed: true,
    });
    expect(logger.messages('warn')).toEqual(["No tests directory found for 'lib_docs'."]);

    const utilsRun = invoker.invocations[1];
    expect(utilsRun.cwd).toBe(path.join(libs, 'lib_utils'));
    expect(utilsRun.stdio).toBe('inherit');
    expect(utilsRun.args).toEqual([path.join(libs, 'lib_utils', 'tests')]);
    expect(utilsRun.env).toEqual({
      PYTHONPATH: [
        path.join(libs, 'lib_utils', 'src'),
        path.join(libs, 'lib_common', 'src'),
        '/opt/site',
      ].join(path.delimiter),
    });
  });

  it('passes verbose and coverage flags to pytest', async () => {
    const { invoker, runner } = await setup();

    await runner.run({ library: 'lib_common', verbose: true, coverage: true });

    expect(invoker.invocations).toHaveLength(1);
    expect(invoker.invocations[0].args.slice(0, 4)).toEqual(['-v', '--cov', '--cov-report', 'term']);
  });

  it('fails overall when any library fails', async () => {
    const { runner } = await setup(['lib_common']);

    const summary = await runner.run();

    expect(summary.passed).toBe(false);
    expect(summary.results.map((r) => r.exitCode)).toEqual([1, 0]);
  });

  it('rejects an unknown library', async () => {
    const { runner } = await setup();
    await expect(runner.run({ library: 'lib_missing' })).rejects.toBeInstanceOf(UsageError);
  });
});
