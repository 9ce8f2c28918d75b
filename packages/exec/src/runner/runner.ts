import { execa } from 'execa';
import { ProcessError, type Logger } from '@lambdakit/shared';
import { formatCommand, type ToolInvocation, type ToolInvoker, type ToolResult } from './types';

/**
 * Runs tools as child processes through execa. There is no timeout: a hung tool
 * blocks the caller until it exits.
 */
export class ExecaToolInvoker implements ToolInvoker {
  constructor(private readonly logger?: Logger) {}

  async invoke(invocation: ToolInvocation): Promise<ToolResult> {
    const commandLine = formatCommand(invocation);
    this.logger?.debug(`Running: ${commandLine}`);

    const result = await execa(invocation.command, invocation.args, {
      cwd: invocation.cwd,
      env: invocation.env,
      stdio: invocation.stdio ?? 'pipe',
      reject: false,
    });

    const stdout = typeof result.stdout === 'string' ? result.stdout : '';
    const stderr = typeof result.stderr === 'string' ? result.stderr : '';

    // No exit code means the process never ran or was killed by a signal.
    if (result.exitCode === undefined) {
      const reason = result.signal ? `terminated by ${result.signal}` : 'could not be started';
      throw new ProcessError(`${invocation.command} ${reason}`, {
        details: { command: commandLine, cwd: invocation.cwd },
        stdout,
        stderr,
      });
    }

    return { exitCode: result.exitCode, stdout, stderr };
  }
}
