import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import path from 'path';
import { ScriptedToolInvoker } from '@lambdakit/exec';
import { RecordingLogger } from '@lambdakit/shared';
import { runCli } from '../program';

const { whichSpy } = vi.hoisted(() => ({
  whichSpy: vi.fn(),
}));

vi.mock('which', () => ({
  default: whichSpy,
}));

describe('doctor', () => {
  let root: string;
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'lambdakit-doctor-'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    whichSpy.mockReset();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  const doctor = () =>
    runCli(['node', 'lambdakit', 'doctor'], {
      cwd: root,
      invoker: new ScriptedToolInvoker(),
      ui: { confirm: async () => false },
      logger: new RecordingLogger(),
      env: { PATH: '/usr/bin' },
    });

  const lines = () => logSpy.mock.calls.map((c) => String(c[0]));

  it('reports missing tools and directories', async () => {
    whichSpy.mockImplementation(async (name: string) => (name === 'sam' ? null : `/usr/bin/${name}`));

    expect(await doctor()).toBe(0);

    const output = lines();
    expect(output.some((l) => l.endsWith('Configuration loaded.'))).toBe(true);
    expect(output.some((l) => l.endsWith('uv found at: /usr/bin/uv'))).toBe(true);
    expect(output.some((l) => l.endsWith('sam not found in PATH.'))).toBe(true);
    expect(output.some((l) => l.endsWith('Lambdas directory not found: lambdas'))).toBe(true);
    expect(output.some((l) => l.includes('Doctor checks failed.'))).toBe(true);
    expect(whichSpy).toHaveBeenCalledWith('python', { nothrow: true, path: '/usr/bin' });
  });

  it('passes when everything is in place', async () => {
    whichSpy.mockImplementation(async (name: string) => `/usr/bin/${name}`);
    await fs.mkdir(path.join(root, 'lambdas'));
    await fs.mkdir(path.join(root, 'libs'));

    await doctor();

    expect(lines().some((l) => l.includes('All checks passed.'))).toBe(true);
    expect(lines().some((l) => l.endsWith('Libraries directory: libs'))).toBe(true);
  });
});
