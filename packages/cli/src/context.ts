import type { Command } from 'commander';
import { ConfigLoader, resolveLayout, type ProjectLayout } from '@lambdakit/core';
import { ExecaToolInvoker, type ToolInvoker } from '@lambdakit/exec';
import { ConsoleLogger, type Config, type Logger } from '@lambdakit/shared';
import { OutputRenderer } from './output/renderer';
import { ConsoleUI, type UserInterface } from './ui/console';

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  outputDir?: string;
}

/**
 * Loads configuration with the global flags layered on top of every file.
 */
export function loadConfig(options: GlobalOptions, cwd: string): Config {
  return ConfigLoader.load({
    cwd,
    configPath: options.config,
    flags: { paths: { output: options.outputDir } },
  });
}

/**
 * Everything a command reaches outside its own process. Tests swap in fakes.
 */
export interface CliContext {
  cwd: string;
  invoker: ToolInvoker;
  ui: UserInterface;
  /** Used instead of a console logger when set */
  logger?: Logger;
  env: NodeJS.ProcessEnv;
}

export function defaultContext(): CliContext {
  return {
    cwd: process.cwd(),
    invoker: new ExecaToolInvoker(),
    ui: new ConsoleUI(),
    env: process.env,
  };
}

export interface CommandEnvironment {
  options: GlobalOptions;
  logger: Logger;
  renderer: OutputRenderer;
}

export interface ProjectEnvironment extends CommandEnvironment {
  config: Config;
  layout: ProjectLayout;
}

export function commandEnvironment(program: Command, context: CliContext): CommandEnvironment {
  const options = program.opts<GlobalOptions>();
  const level = options.verbose ? 'debug' : options.json ? 'warn' : 'info';
  return {
    options,
    logger: context.logger ?? new ConsoleLogger({ level }),
    renderer: new OutputRenderer(Boolean(options.json)),
  };
}

/**
 * Loads configuration for the project in the working directory.
 */
export function projectEnvironment(program: Command, context: CliContext): ProjectEnvironment {
  const base = commandEnvironment(program, context);
  const config = loadConfig(base.options, context.cwd);
  return { ...base, config, layout: resolveLayout(context.cwd, config) };
}
