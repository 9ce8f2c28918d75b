import path from 'path';
import yaml from 'js-yaml';
import {
  UsageError,
  atomicWrite,
  functionLogicalId,
  isFile,
  normalizePath,
  type Config,
  type Logger,
} from '@lambdakit/shared';
import { FUNCTION_ENTRY_FILE, listFunctions, type ProjectLayout } from '../project/discovery';

/** `!Ref <logicalId>` */
export class Ref {
  constructor(readonly logicalId: string) {}
}

/** `!GetAtt <logicalId>.<attribute>` */
export class GetAtt {
  constructor(
    readonly logicalId: string,
    readonly attribute: string,
  ) {}
}

const RefType = new yaml.Type('!Ref', {
  kind: 'scalar',
  instanceOf: Ref,
  represent: (data) => (data instanceof Ref ? data.logicalId : ''),
  construct: (data: unknown) => new Ref(String(data)),
});

const GetAttType = new yaml.Type('!GetAtt', {
  kind: 'scalar',
  instanceOf: GetAtt,
  represent: (data) => (data instanceof GetAtt ? `${data.logicalId}.${data.attribute}` : ''),
  construct: (data: unknown) => {
    const [logicalId, ...attribute] = String(data).split('.');
    return new GetAtt(logicalId, attribute.join('.'));
  },
});

/**
 * Default schema plus the CloudFormation intrinsics used in generated templates.
 */
export const SAM_SCHEMA = yaml.DEFAULT_SCHEMA.extend([RefType, GetAttType]);

export const SHARED_LAYER_ID = 'SharedLibsLayer';

export type TemplateValue =
  | string
  | number
  | boolean
  | Ref
  | GetAtt
  | TemplateValue[]
  | { [key: string]: TemplateValue };

export interface SamResource {
  Type: string;
  Properties: { [key: string]: TemplateValue };
}

export interface SamOutput {
  Description: string;
  Value: TemplateValue;
}

export interface SamTemplate {
  AWSTemplateFormatVersion: string;
  Transform: string;
  Description?: string;
  Resources: Record<string, SamResource>;
  Outputs?: Record<string, SamOutput>;
}

export interface TemplateOptions {
  functions: string[];
  includeLayer: boolean;
  /** CodeUri for a function; `./lambdas/<name>/` by default */
  codeUri?: (name: string) => string;
  /** Leave out Description, FunctionName, environment and Outputs */
  minimal?: boolean;
}

function runtime(config: Config): string {
  return `python${config.runtime.pythonVersion}`;
}

function functionResource(name: string, config: Config, options: TemplateOptions): SamResource {
  const codeUri = options.codeUri ? options.codeUri(name) : `./${normalizePath(config.paths.lambdas)}/${name}/`;
  const properties: SamResource['Properties'] = {};

  if (!options.minimal) {
    properties.FunctionName = name;
  }
  properties.CodeUri = codeUri;
  properties.Handler = config.functions.handler;
  properties.Runtime = runtime(config);
  properties.Architectures = [config.runtime.architecture];

  if (!options.minimal) {
    properties.MemorySize = config.functions.memorySize;
    properties.Timeout = config.functions.timeout;
    properties.Environment = { Variables: { LAMBDA_FUNCTION_NAME: name } };
  }
  if (options.includeLayer) {
    properties.Layers = [new Ref(SHARED_LAYER_ID)];
  }

  return { Type: 'AWS::Serverless::Function', Properties: properties };
}

/**
 * Builds the template document. Intrinsics stay as `Ref` and `GetAtt` values
 * until serialisation.
 */
export function buildSamTemplate(config: Config, options: TemplateOptions): SamTemplate {
  const resources: Record<string, SamResource> = {};
  const outputs: Record<string, SamOutput> = {};

  if (options.includeLayer) {
    resources[SHARED_LAYER_ID] = {
      Type: 'AWS::Serverless::LayerVersion',
      Properties: {
        LayerName: 'shared-libs-layer',
        Description: 'Layer containing shared libraries and dependencies',
        ContentUri: `./${normalizePath(config.paths.output)}/layers/combined/`,
        CompatibleRuntimes: [runtime(config)],
        RetentionPolicy: 'Retain',
      },
    };
    outputs[`${SHARED_LAYER_ID}Arn`] = {
      Description: 'ARN of the shared libraries layer',
      Value: new Ref(SHARED_LAYER_ID),
    };
  }

  for (const name of options.functions) {
    const logicalId = functionLogicalId(name);
    resources[logicalId] = functionResource(name, config, options);
    outputs[`${logicalId}Arn`] = {
      Description: `ARN of the ${name} function`,
      Value: new GetAtt(logicalId, 'Arn'),
    };
  }

  if (options.minimal) {
    return {
      AWSTemplateFormatVersion: '2010-09-09',
      Transform: 'AWS::Serverless-2016-10-31',
      Resources: resources,
    };
  }

  return {
    AWSTemplateFormatVersion: '2010-09-09',
    Transform: 'AWS::Serverless-2016-10-31',
    Description: 'SAM template for Lambda functions and layers',
    Resources: resources,
    Outputs: outputs,
  };
}

export function renderSamTemplate(template: SamTemplate): string {
  return yaml.dump(template, { schema: SAM_SCHEMA, noRefs: true, lineWidth: -1 });
}

export interface GenerateTemplateOptions {
  /** Functions to include; all discovered functions when empty or absent */
  names?: string[];
  includeLayer: boolean;
  outputFile: string;
}

export interface GeneratedTemplate {
  outputFile: string;
  functions: string[];
}

/**
 * Writes a deployable SAM template for the project's functions.
 */
export class SamTemplateGenerator {
  constructor(
    private readonly config: Config,
    private readonly layout: ProjectLayout,
    private readonly logger: Logger,
  ) {}

  async generate(options: GenerateTemplateOptions): Promise<GeneratedTemplate> {
    const functions = await this.selectFunctions(options.names);
    if (functions.length === 0) {
      throw new UsageError('No Lambda functions to include in the template');
    }

    const template = buildSamTemplate(this.config, {
      functions,
      includeLayer: options.includeLayer,
    });
    const outputFile = path.resolve(this.layout.root, options.outputFile);
    await atomicWrite(outputFile, renderSamTemplate(template));

    this.logger.info(`SAM template generated: ${outputFile}`);
    return { outputFile, functions };
  }

  private async selectFunctions(names: string[] | undefined): Promise<string[]> {
    if (!names || names.length === 0) {
      return (await listFunctions(this.layout)).map((f) => f.name);
    }

    const selected: string[] = [];
    for (const name of names) {
      if (await isFile(path.join(this.layout.lambdasDir, name, FUNCTION_ENTRY_FILE))) {
        selected.push(name);
      } else {
        this.logger.warn(`Lambda function '${name}' not found. Skipping.`);
      }
    }
    return selected;
  }
}
