import type { Command } from 'commander';
import which from 'which';
import chalk from 'chalk';
import { resolveLayout } from '@lambdakit/core';
import { defaultConfig, errorMessage, isDirectory, relative, type Config } from '@lambdakit/shared';
import { loadConfig, type CliContext, type GlobalOptions } from '../context';

const CHECKS = {
  OK: chalk.green('✔'),
  WARN: chalk.yellow('!'),
  FAIL: chalk.red('✖'),
};

type CheckResult = [string, string];

async function checkExecutable(name: string, env: NodeJS.ProcessEnv): Promise<CheckResult> {
  const found = await which(name, { nothrow: true, path: env.PATH });
  if (found) {
    return [CHECKS.OK, `${name} found at: ${found}`];
  }
  return [CHECKS.FAIL, `${name} not found in PATH.`];
}

async function checkDirectory(label: string, root: string, dir: string): Promise<CheckResult> {
  if (await isDirectory(dir)) {
    return [CHECKS.OK, `${label} directory: ${relative(root, dir)}`];
  }
  return [CHECKS.WARN, `${label} directory not found: ${relative(root, dir)}`];
}

export function registerDoctorCommand(program: Command, context: CliContext) {
  program
    .command('doctor')
    .description('Check that the external tools and project layout are in place')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();
      console.log(chalk.bold('Lambda Project Checkup'));

      const results: CheckResult[] = [];
      let config: Config = defaultConfig();

      try {
        config = loadConfig(globalOpts, context.cwd);
        results.push([CHECKS.OK, 'Configuration loaded.']);
      } catch (error: unknown) {
        results.push([CHECKS.FAIL, `Failed to load configuration: ${errorMessage(error)}`]);
      }

      const { tools } = config;
      for (const tool of [tools.python, tools.uv, tools.sam, tools.pytest]) {
        results.push(await checkExecutable(tool, context.env));
      }

      const layout = resolveLayout(context.cwd, config);
      results.push(await checkDirectory('Lambdas', layout.root, layout.lambdasDir));
      results.push(await checkDirectory('Libraries', layout.root, layout.libsDir));

      console.log('---------------------------------');
      results.forEach(([status, message]) => {
        console.log(`${status} ${message}`);
      });
      console.log('---------------------------------');

      const hasFailures = results.some(([status]) => status === CHECKS.FAIL);
      if (hasFailures) {
        console.log(
          chalk.red.bold('Doctor checks failed.') +
            ' Please resolve the issues marked with ' +
            CHECKS.FAIL,
        );
      } else {
        console.log(chalk.green.bold('All checks passed. Your environment looks good!'));
      }
    });
}
