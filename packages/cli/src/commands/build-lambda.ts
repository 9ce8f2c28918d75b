import type { Command } from 'commander';
import { FunctionBuilder } from '@lambdakit/core';
import { projectEnvironment, type CliContext } from '../context';

export function registerBuildLambdaCommand(program: Command, context: CliContext) {
  program
    .command('build-lambda')
    .description('Package a Lambda function into the output directory')
    .argument('<name>', 'Function directory name under the lambdas directory')
    .action(async (name: string) => {
      const { layout, logger, renderer } = projectEnvironment(program, context);

      const result = await new FunctionBuilder(layout, logger).build(name);

      renderer.render({
        status: 'SUCCESS',
        summary: `Built Lambda function ${name}`,
        items: result.files,
        artifacts: { Output: result.outputPath, Archive: result.zipPath },
        function: result,
      });
    });
}
