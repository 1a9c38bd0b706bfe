import { promises as fs } from 'fs';
import { basename, dirname, join, resolve } from 'path';
import { BufferFileSet } from '../../domain/services/BufferFileSet';
import { Logger } from '../../application/interfaces/Logger';
import { describeError, errorCode, isFileInUse } from './errors';

const BUFFER_FILE_EXTENSION = '.json';

/**
 * Buffer files are `<baseName><suffix>.json`. The writer's suffixes sort in
 * creation order, so an ordinal sort is a chronological one.
 */
export class FileSystemBufferFileSet implements BufferFileSet {
  private readonly folder: string;
  private readonly prefix: string;

  constructor(bufferBaseFilename: string, private readonly logger: Logger) {
    const absolute = resolve(bufferBaseFilename);
    this.folder = dirname(absolute);
    this.prefix = basename(absolute);
  }

  public async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.folder);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }

    return entries
      .filter(name => name.startsWith(this.prefix) && name.endsWith(BUFFER_FILE_EXTENSION))
      .map(name => join(this.folder, name))
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  public async exists(file: string): Promise<boolean> {
    try {
      const stats = await fs.stat(file);
      return stats.isFile();
    } catch (error) {
      return false;
    }
  }

  public async remove(file: string): Promise<void> {
    await fs.unlink(file);
  }

  public async isUnlockedAtLength(file: string, maxLength: number): Promise<boolean> {
    try {
      const handle = await fs.open(file, 'r+');
      try {
        const { size } = await handle.stat();
        return size <= maxLength;
      } finally {
        await handle.close();
      }
    } catch (error) {
      if (!isFileInUse(error)) {
        this.logger.warn('Unexpected I/O error while testing locked status', {
          file,
          error: describeError(error)
        });
      }
    }

    return false;
  }
}
