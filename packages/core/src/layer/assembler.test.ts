import { describe, it, expect, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import path from 'path';
import AdmZip from 'adm-zip';
import { RecordingLogger, pathExists } from '@lambdakit/shared';
import { LayerAssembler } from './assembler';

describe('LayerAssembler', () => {
  let dir: string;

  afterEach(async () => {
    if (dir) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  async function stage(files: Record<string, string>): Promise<string> {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lambdakit-assemble-'));
    const staging = path.join(dir, 'staging', 'python');
    for (const [relative, content] of Object.entries(files)) {
      await fs.mkdir(path.dirname(path.join(staging, relative)), { recursive: true });
      await fs.writeFile(path.join(staging, relative), content);
    }
    return staging;
  }

  it('archives every staged file under the runtime root', async () => {
    const files = {
      'pydantic/__init__.py': 'VERSION = "2.6.1"\n',
      'pydantic/fields.py': 'class Field: ...\n',
      'lib_common/__init__.py': '',
      'lib_common/models/user.py': 'NAME = "user"\n',
    };
    const staging = await stage(files);
    const assembler = new LayerAssembler('python', new RecordingLogger());

    const result = await assembler.assemble(staging, path.join(dir, 'dist'), 'combined', {
      zipBasename: 'combined-layer',
    });

    expect(result.outputPath).toBe(path.join(dir, 'dist', 'layers', 'combined'));
    expect(result.zipPath).toBe(path.join(dir, 'dist', 'layers', 'combined-layer.zip'));
    expect(await fs.readdir(result.outputPath)).toEqual(['python']);

    const zip = new AdmZip(result.zipPath);
    const entries = zip
      .getEntries()
      .filter((e) => !e.isDirectory)
      .map((e) => e.entryName)
      .sort();
    expect(entries).toEqual(Object.keys(files).map((f) => `python/${f}`).sort());
    for (const [relative, content] of Object.entries(files)) {
      expect(zip.readAsText(`python/${relative}`)).toBe(content);
    }
  });

  it('copies the staged tree into the output layer directory', async () => {
    const staging = await stage({ 'orjson/__init__.py': 'x = 1\n' });
    const assembler = new LayerAssembler('python', new RecordingLogger());

    const result = await assembler.assemble(staging, path.join(dir, 'dist'), 'deps');

    expect(result.zipPath).toBeUndefined();
    expect(
      await fs.readFile(path.join(result.outputPath, 'python', 'orjson', '__init__.py'), 'utf8'),
    ).toBe('x = 1\n');
  });

  it('merges into existing output on a second run', async () => {
    const staging = await stage({ 'a/__init__.py': 'first\n' });
    const assembler = new LayerAssembler('python', new RecordingLogger());
    const outputDir = path.join(dir, 'dist');
    await assembler.assemble(staging, outputDir, 'libs', { zipBasename: 'libs-layer' });

    await fs.writeFile(path.join(staging, 'a', '__init__.py'), 'second\n');
    await fs.mkdir(path.join(staging, 'b'));
    await fs.writeFile(path.join(staging, 'b', '__init__.py'), '');
    const result = await assembler.assemble(staging, outputDir, 'libs', { zipBasename: 'libs-layer' });

    const layerRoot = path.join(result.outputPath, 'python');
    expect(await fs.readFile(path.join(layerRoot, 'a', '__init__.py'), 'utf8')).toBe('second\n');
    expect(await pathExists(path.join(layerRoot, 'b', '__init__.py'))).toBe(true);
    expect(new AdmZip(result.zipPath).readAsText('python/a/__init__.py')).toBe('second\n');
  });
});
