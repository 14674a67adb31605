/**
 * Local destination for downloaded artifacts (exports, processed models).
 * Bytes go to `<name>.part` and are renamed into place on close.
 */

import * as fsp from 'fs/promises';
import * as path from 'path';
import type { ArtifactSink } from './collaborators';
import { ScanSyncError } from './errors';

export interface ArtifactStorage {
  /** Final path for a declared filename; the same name always maps to the same path. */
  pathFor(fileName: string): string;
  createSink(fileName: string): Promise<ArtifactSink>;
  /** Delete a finished file; a missing file is not an error. */
  remove(filePath: string): Promise<void>;
}

export function sanitizeFileName(fileName: string): string {
  const base = path.basename(fileName.replace(/\\/g, '/')).trim();
  const cleaned = base.replace(/[^\w.\- ]/g, '_').replace(/^\.+/, '');
  return cleaned || 'download';
}

export class FileArtifactStorage implements ArtifactStorage {
  constructor(private readonly downloadsDir: string) {}

  pathFor(fileName: string): string {
    return path.join(path.resolve(this.downloadsDir), sanitizeFileName(fileName));
  }

  async remove(filePath: string): Promise<void> {
    await fsp.rm(filePath, { force: true });
  }

  async createSink(fileName: string): Promise<ArtifactSink> {
    const finalPath = this.pathFor(fileName);
    const partPath = `${finalPath}.part`;
    await fsp.mkdir(path.dirname(finalPath), { recursive: true });
    const handle = await fsp.open(partPath, 'w');
    let closed = false;

    return {
      write: async (chunk) => {
        if (closed) {
          throw new ScanSyncError('validation', `Sink for ${fileName} is already closed`);
        }
        await handle.write(chunk);
      },
      close: async () => {
        if (closed) return finalPath;
        closed = true;
        await handle.close();
        await fsp.rename(partPath, finalPath);
        return finalPath;
      },
      abort: async () => {
        if (!closed) {
          closed = true;
          await handle.close();
        }
        await fsp.rm(partPath, { force: true });
      },
    };
  }
}
