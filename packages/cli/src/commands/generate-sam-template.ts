import type { Command } from 'commander';
import { SamTemplateGenerator } from '@lambdakit/core';
import { projectEnvironment, type CliContext } from '../context';

interface GenerateOptions {
  output: string;
  lambda?: string[];
  layer: boolean;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function registerGenerateSamTemplateCommand(program: Command, context: CliContext) {
  program
    .command('generate-sam-template')
    .description('Generate a SAM template for deploying the functions and shared layer')
    .option('-o, --output <file>', 'Output file for the SAM template', 'template.yaml')
    .option('-l, --lambda <name>', 'Include only this function (repeatable)', collect)
    .option('--no-layer', 'Leave out the shared layer')
    .action(async (options: GenerateOptions) => {
      const { config, layout, logger, renderer } = projectEnvironment(program, context);

      const generated = await new SamTemplateGenerator(config, layout, logger).generate({
        names: options.lambda,
        includeLayer: options.layer,
        outputFile: options.output,
      });

      renderer.render({
        status: 'SUCCESS',
        summary: 'SAM template generated',
        items: generated.functions,
        artifacts: { Template: generated.outputFile },
        nextSteps: [
          'Build the layer first: lambdakit build-layer',
          `Deploy with: sam deploy --guided --template-file ${options.output}`,
        ],
        template: generated,
      });
    });
}
