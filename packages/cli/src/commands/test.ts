import type { Command } from 'commander';
import { LibraryTestRunner } from '@lambdakit/core';
import { PytestRunner } from '@lambdakit/exec';
import { ProcessError } from '@lambdakit/shared';
import { projectEnvironment, type CliContext } from '../context';

interface TestOptions {
  verbose?: boolean;
  coverage?: boolean;
}

export function registerTestCommand(program: Command, context: CliContext) {
  program
    .command('test')
    .description('Run pytest for shared libraries')
    .argument('[lib]', 'Library to test; every library when omitted')
    .option('-v, --verbose', 'Verbose pytest output')
    .option('-c, --coverage', 'Report coverage')
    .action(async (lib: string | undefined, options: TestOptions) => {
      const { config, layout, logger, renderer } = projectEnvironment(program, context);

      const pytest = new PytestRunner(context.invoker, config.tools.pytest);
      const runner = new LibraryTestRunner(layout, pytest, logger, context.env);
      const summary = await runner.run({
        library: lib,
        verbose: options.verbose,
        coverage: options.coverage,
      });

      if (!summary.passed) {
        const failed = summary.results.filter((r) => r.exitCode !== 0).map((r) => r.library);
        throw new ProcessError('Some tests failed.', { details: { failed } });
      }

      renderer.render({
        status: 'SUCCESS',
        summary: summary.results.length > 0 ? 'All tests passed.' : 'No tests were run.',
        items: summary.results.map((r) => r.library),
        tests: summary,
      });
    });
}
