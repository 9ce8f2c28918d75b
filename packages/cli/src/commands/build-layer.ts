import type { Command } from 'commander';
import { LayerBuilder, planLayers, type LayerBuildResult } from '@lambdakit/core';
import { projectEnvironment, type CliContext } from '../context';

interface BuildLayerOptions {
  libs: boolean;
  deps: boolean;
  combined: boolean;
  zip: boolean;
  zipName?: string;
}

function describeLayer(result: LayerBuildResult): string[] {
  const items = result.artifacts.map(
    (a) => `${a.libraryName}: ${a.kind === 'wheel' ? 'wheel' : 'source copy'}`,
  );
  if (result.dependencies.length > 0) {
    items.push(`dependencies: ${result.dependencies.map((d) => d.requirement).join(', ')}`);
  }
  return items;
}

export function registerBuildLayerCommand(program: Command, context: CliContext) {
  program
    .command('build-layer')
    .description('Build the Lambda layer from shared libraries and their dependencies')
    .option('--no-libs', 'Leave shared libraries out of the layer')
    .option('--no-deps', 'Leave third-party dependencies out of the layer')
    .option('--no-combined', 'Build separate libs and deps layers')
    .option('--no-zip', 'Skip the zip archive')
    .option('--zip-name <name>', 'Base name of the zip archive')
    .action(async (options: BuildLayerOptions) => {
      const { config, layout, logger, renderer } = projectEnvironment(program, context);

      const variants = planLayers(options);
      const builder = new LayerBuilder({ config, layout, invoker: context.invoker, logger });
      const results = await builder.buildAll(variants, {
        zip: options.zip,
        zipName: options.zipName,
      });

      for (const result of results) {
        renderer.render({
          status: 'SUCCESS',
          summary: `Built ${result.layerName} layer`,
          items: describeLayer(result),
          artifacts: { Output: result.outputPath, Archive: result.zipPath },
          layer: result,
        });
      }
    });
}
