import fs from 'node:fs';
import { promises as fsp } from 'node:fs';
import path from 'path';
import archiver from 'archiver';
import { ArchiveError, errorMessage } from '@lambdakit/shared';

export type ZipInput =
  /** A directory tree, stored under `prefix` (or at the archive root when false) */
  | { kind: 'directory'; path: string; prefix: string | false }
  /** A single file stored as `name` */
  | { kind: 'file'; path: string; name: string };

/**
 * Writes a deflate-compressed zip at `zipPath`. Entry paths use forward slashes.
 * A partially written archive is removed before the error is raised.
 */
export async function writeZip(zipPath: string, inputs: ZipInput[]): Promise<string> {
  try {
    await fsp.mkdir(path.dirname(zipPath), { recursive: true });
    await pipeArchive(zipPath, inputs);
  } catch (error: unknown) {
    await fsp.rm(zipPath, { force: true });
    throw new ArchiveError(`${path.basename(zipPath)}: ${errorMessage(error)}`, {
      cause: error,
      details: { zipPath },
    });
  }
  return zipPath;
}

function pipeArchive(zipPath: string, inputs: ZipInput[]): Promise<void> {
  return new Promise((resolve, reject) => {
    const output = fs.createWriteStream(zipPath);
    const archive = archiver('zip', {
      zlib: { level: 9 },
    });

    output.on('close', () => resolve());
    output.on('error', reject);
    archive.on('warning', reject);
    archive.on('error', reject);

    archive.pipe(output);

    for (const input of inputs) {
      if (input.kind === 'directory') {
        archive.directory(input.path, input.prefix);
      } else {
        archive.file(input.path, { name: input.name });
      }
    }

    archive.finalize().catch(reject);
  });
}
