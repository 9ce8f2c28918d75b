import type { Command } from 'commander';
import { listFunctions, listLibraries, type ProjectEntry } from '@lambdakit/core';
import { relative } from '@lambdakit/shared';
import { projectEnvironment, type CliContext } from '../context';

function rows(root: string, entries: ProjectEntry[]): Record<string, string>[] {
  return entries.map((e) => ({ Name: e.name, Path: relative(root, e.path) }));
}

export function registerListCommands(program: Command, context: CliContext) {
  program
    .command('list-lambdas')
    .description('List Lambda functions in the project')
    .action(async () => {
      const { layout, renderer } = projectEnvironment(program, context);
      const functions = await listFunctions(layout);
      renderer.table(rows(layout.root, functions), 'No Lambda functions found.');
    });

  program
    .command('list-libs')
    .description('List shared libraries in the project')
    .action(async () => {
      const { config, layout, renderer } = projectEnvironment(program, context);
      const libraries = await listLibraries(layout, config.layer.manifestFile);
      renderer.table(rows(layout.root, libraries), 'No shared libraries found.');
    });
}
