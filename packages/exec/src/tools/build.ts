import path from 'node:path';
import { listFiles } from '@lambdakit/shared';
import type { ToolInvoker, ToolResult } from '../runner/types';

export type BuildWheelResult =
  | { ok: true; wheels: string[]; result: ToolResult }
  | { ok: false; reason: string; result: ToolResult };

/**
 * `python -m build --wheel`: builds a distributable from a library's source tree.
 */
export class PythonBuildTool {
  constructor(
    private readonly invoker: ToolInvoker,
    private readonly python: string = 'python',
  ) {}

  /**
   * Succeeds only when the tool exits 0 and at least one wheel lands in `outDir`.
   * Returned wheel paths are absolute and sorted.
   */
  async buildWheel(sourceDir: string, outDir: string): Promise<BuildWheelResult> {
    const result = await this.invoker.invoke({
      command: this.python,
      args: ['-m', 'build', '--wheel', '--outdir', outDir, sourceDir],
    });

    if (result.exitCode !== 0) {
      return { ok: false, reason: `build exited with code ${result.exitCode}`, result };
    }

    const wheels = (await listFiles(outDir, '.whl')).map((name) => path.join(outDir, name));
    if (wheels.length === 0) {
      return { ok: false, reason: 'build produced no wheel', result };
    }
    return { ok: true, wheels, result };
  }
}
