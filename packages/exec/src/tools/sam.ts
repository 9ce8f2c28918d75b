import type { ToolInvoker, ToolResult } from '../runner/types';

/**
 * AWS SAM CLI.
 */
export class SamCli {
  constructor(
    private readonly invoker: ToolInvoker,
    private readonly sam: string = 'sam',
  ) {}

  localInvoke(templatePath: string, logicalId: string, eventFile?: string): Promise<ToolResult> {
    const args = ['local', 'invoke', '-t', templatePath];
    if (eventFile) {
      args.push('-e', eventFile);
    }
    args.push(logicalId);
    return this.invoker.invoke({ command: this.sam, args });
  }
}
