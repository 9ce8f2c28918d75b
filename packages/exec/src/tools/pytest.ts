import type { ToolInvoker, ToolResult } from '../runner/types';

export interface PytestRunOptions {
  cwd: string;
  env?: Record<string, string>;
  /** Flags placed before the tests directory */
  args?: string[];
}

export class PytestRunner {
  constructor(
    private readonly invoker: ToolInvoker,
    private readonly pytest: string = 'pytest',
  ) {}

  /** Output goes straight to the terminal. */
  run(testsDir: string, options: PytestRunOptions): Promise<ToolResult> {
    return this.invoker.invoke({
      command: this.pytest,
      args: [...(options.args ?? []), testsDir],
      cwd: options.cwd,
      env: options.env,
      stdio: 'inherit',
    });
  }
}
