export type ToolStdio = 'pipe' | 'inherit';

/**
 * One external tool call: the executable, its arguments and where to run it.
 */
export interface ToolInvocation {
  command: string;
  args: string[];
  cwd?: string;
  /** Extra variables, merged over the inherited environment */
  env?: Record<string, string>;
  /** `inherit` streams output to the terminal; nothing is captured */
  stdio?: ToolStdio;
}

export interface ToolResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Capability to run an external tool and wait for it to exit.
 *
 * Resolves for every exit code; callers decide what a non-zero exit means.
 * Rejects with ProcessError only when the tool cannot be started.
 */
export interface ToolInvoker {
  invoke(invocation: ToolInvocation): Promise<ToolResult>;
}

export function formatCommand(invocation: Pick<ToolInvocation, 'command' | 'args'>): string {
  return [invocation.command, ...invocation.args].join(' ');
}
