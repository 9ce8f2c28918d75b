import type { Command } from 'commander';
import { LocalInvoker } from '@lambdakit/core';
import { SamCli } from '@lambdakit/exec';
import { projectEnvironment, type CliContext } from '../context';

export function registerInvokeLocalCommand(program: Command, context: CliContext) {
  program
    .command('invoke-local')
    .description('Invoke a Lambda function locally with the SAM CLI')
    .argument('<name>', 'Function directory name under the lambdas directory')
    .option('-e, --event-file <file>', 'JSON event file')
    .action(async (name: string, options: { eventFile?: string }) => {
      const { config, layout, logger, renderer } = projectEnvironment(program, context);

      const sam = new SamCli(context.invoker, config.tools.sam);
      const result = await new LocalInvoker(config, layout, sam, logger).invoke(
        name,
        options.eventFile,
      );

      renderer.render({
        status: 'SUCCESS',
        summary: 'Lambda invocation successful',
        output: result.stdout,
      });
      renderer.log(result.stdout);
    });
}
