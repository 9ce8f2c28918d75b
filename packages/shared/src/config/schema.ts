import { z } from 'zod';

export const PathsConfigSchema = z.object({
  /** Directory holding one subdirectory per Lambda function */
  lambdas: z.string().min(1).default('lambdas'),
  /** Directory holding one subdirectory per shared library */
  libs: z.string().min(1).default('libs'),
  /** Root of every build output (functions and layers) */
  output: z.string().min(1).default('dist'),
});

export const RuntimeConfigSchema = z.object({
  pythonVersion: z
    .string()
    .regex(/^\d+\.\d+$/, 'expected a <major>.<minor> version such as 3.13')
    .default('3.13'),
  architecture: z.enum(['x86_64', 'arm64']).default('x86_64'),
});

export const LayerConfigSchema = z.object({
  /** Directory name the Lambda runtime expects at the root of a layer */
  runtimeRoot: z.string().min(1).default('python'),
  /** Dependency names starting with this prefix are local libraries, never sent to the installer */
  localPrefix: z.string().min(1).default('lib_'),
  /** Source packages starting with this marker are not copied into a layer */
  internalMarker: z.string().min(1).default('__'),
  manifestFile: z.string().min(1).default('pyproject.toml'),
  /** Keep version constraints in the generated requirements file */
  pinVersions: z.boolean().default(false),
});

export const FunctionsConfigSchema = z.object({
  handler: z.string().min(1).default('app.handler'),
  memorySize: z.number().int().min(128).max(10240).default(256),
  timeout: z.number().int().min(1).max(900).default(30),
});

export const ToolsConfigSchema = z.object({
  python: z.string().min(1).default('python'),
  uv: z.string().min(1).default('uv'),
  sam: z.string().min(1).default('sam'),
  pytest: z.string().min(1).default('pytest'),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  paths: PathsConfigSchema.default({}),
  runtime: RuntimeConfigSchema.default({}),
  layer: LayerConfigSchema.default({}),
  functions: FunctionsConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
/** Config as written in YAML files or passed as flags: every field optional */
export type ConfigInput = z.input<typeof ConfigSchema>;
export type PathsConfig = z.infer<typeof PathsConfigSchema>;
export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type LayerConfig = z.infer<typeof LayerConfigSchema>;
export type FunctionsConfig = z.infer<typeof FunctionsConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;

/**
 * Fully defaulted configuration.
 */
export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}
