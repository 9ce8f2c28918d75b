import type { MaybePromise } from '@lambdakit/shared';
import { formatCommand, type ToolInvocation, type ToolInvoker, type ToolResult } from './types';

export type ToolHandler = (invocation: ToolInvocation) => MaybePromise<Partial<ToolResult>>;

/**
 * Deterministic stand-in for external tools. Every call is recorded; the handler
 * decides the result and may create files the real tool would have written.
 */
export class ScriptedToolInvoker implements ToolInvoker {
  readonly invocations: ToolInvocation[] = [];

  constructor(private readonly handler: ToolHandler = () => ({})) {}

  async invoke(invocation: ToolInvocation): Promise<ToolResult> {
    this.invocations.push(invocation);
    const result = await this.handler(invocation);
    return {
      exitCode: result.exitCode ?? 0,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
    };
  }

  commandLines(): string[] {
    return this.invocations.map((i) => formatCommand(i));
  }
}
