import type { ToolInvoker, ToolResult } from '../runner/types';

export interface InstallArtifactOptions {
  /** Install only the artifact's own files, not its requirements */
  noDeps?: boolean;
}

/**
 * `uv pip install --target`: installs packages as importable directories under a target root.
 */
export class UvInstaller {
  constructor(
    private readonly invoker: ToolInvoker,
    private readonly uv: string = 'uv',
  ) {}

  installRequirements(requirementsFile: string, target: string): Promise<ToolResult> {
    return this.invoker.invoke({
      command: this.uv,
      args: ['pip', 'install', '--target', target, '-r', requirementsFile],
    });
  }

  installArtifact(
    artifact: string,
    target: string,
    options: InstallArtifactOptions = {},
  ): Promise<ToolResult> {
    const args = ['pip', 'install', '--target', target];
    if (options.noDeps) {
      args.push('--no-deps');
    }
    args.push(artifact);
    return this.invoker.invoke({ command: this.uv, args });
  }
}
