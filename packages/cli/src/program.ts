import { Command, CommanderError } from 'commander';
import { AppError, ProcessError, errorMessage, exitCodeFor } from '@lambdakit/shared';
import packageJson from '../package.json';
import { defaultContext, type CliContext, type GlobalOptions } from './context';
import { registerBuildLambdaCommand } from './commands/build-lambda';
import { registerBuildLayerCommand } from './commands/build-layer';
import { registerTestCommand } from './commands/test';
import { registerInvokeLocalCommand } from './commands/invoke-local';
import { registerListCommands } from './commands/list';
import { registerGenerateSamTemplateCommand } from './commands/generate-sam-template';
import { registerDoctorCommand } from './commands/doctor';
import { registerInitCommand } from './commands/init';

export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name('lambdakit')
    .description('Build, test and run Python AWS Lambda projects')
    .version(packageJson.version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--output-dir <dir>', 'Override paths.output for this run')
    .enablePositionalOptions()
    .exitOverride();

  registerBuildLambdaCommand(program, context);
  registerBuildLayerCommand(program, context);
  registerTestCommand(program, context);
  registerInvokeLocalCommand(program, context);
  registerListCommands(program, context);
  registerGenerateSamTemplateCommand(program, context);
  registerDoctorCommand(program, context);
  registerInitCommand(program, context);

  return program;
}

function renderError(e: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: errorMessage(e),
          },
        }),
      );
    }
    return;
  }

  // Human-readable output
  console.error(`❌ Error: ${errorMessage(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (e instanceof ProcessError) {
    if (e.stderr) console.error(e.stderr.trimEnd());
    if (e.stdout) console.error(e.stdout.trimEnd());
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Parses `argv`, runs the command and resolves to the process exit code.
 */
export async function runCli(argv: string[], context: CliContext = defaultContext()): Promise<number> {
  const program = createProgram(context);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e: unknown) {
    if (e instanceof CommanderError) {
      // Commander has already printed help, the version or the usage problem
      return e.code === 'commander.helpDisplayed' || e.code === 'commander.version' ? 0 : 2;
    }
    renderError(e, program.opts<GlobalOptions>());
    return exitCodeFor(e);
  }
}
