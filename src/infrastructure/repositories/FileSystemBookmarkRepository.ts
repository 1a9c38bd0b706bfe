import { constants, promises as fs } from 'fs';
import { dirname, resolve } from 'path';
import { Bookmark } from '../../domain/value-objects/Bookmark';
import { BookmarkHandle, BookmarkRepository } from '../../domain/repositories/BookmarkRepository';
import { Logger } from '../../application/interfaces/Logger';
import { ExclusiveFileLock } from '../locking/ExclusiveFileLock';
import { describeError } from '../filesystem/errors';

class FileBookmarkHandle implements BookmarkHandle {
  private closed = false;

  constructor(
    private readonly file: fs.FileHandle,
    private readonly lock: ExclusiveFileLock,
    private readonly bookmarkFile: string,
    private readonly logger: Logger
  ) {}

  public async read(): Promise<Bookmark> {
    this.ensureOpen();

    const { size } = await this.file.stat();
    if (size === 0) {
      return Bookmark.empty();
    }

    const buffer = Buffer.alloc(size);
    const { bytesRead } = await this.file.read(buffer, 0, size, 0);
    const bookmark = Bookmark.parse(buffer.subarray(0, bytesRead).toString('utf8'));

    if (bookmark.isEmpty()) {
      this.logger.warn('Ignoring unreadable bookmark', { bookmarkFile: this.bookmarkFile });
    }

    return bookmark;
  }

  public async write(bookmark: Bookmark): Promise<void> {
    this.ensureOpen();

    await this.file.truncate(0);
    await this.file.write(bookmark.format(), 0, 'utf8');
    this.logger.debug('Bookmark written', {
      bookmarkFile: this.bookmarkFile,
      bookmark: bookmark.toString()
    });
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      await this.file.close();
    } finally {
      await this.lock.release();
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error(`Bookmark handle for ${this.bookmarkFile} is closed`);
    }
  }
}

/**
 * Keeps the shipping cursor in `<baseName>.bookmark`, guarded by
 * `<baseName>.bookmark.lock` for the length of a tick.
 */
export class FileSystemBookmarkRepository implements BookmarkRepository {
  private readonly bookmarkFile: string;
  private readonly lock: ExclusiveFileLock;

  constructor(bufferBaseFilename: string, private readonly logger: Logger) {
    this.bookmarkFile = resolve(`${bufferBaseFilename}.bookmark`);
    this.lock = new ExclusiveFileLock(`${this.bookmarkFile}.lock`, logger);
  }

  public get folder(): string {
    return dirname(this.bookmarkFile);
  }

  public async open(): Promise<BookmarkHandle | null> {
    await fs.mkdir(this.folder, { recursive: true });

    if (!(await this.lock.tryAcquire())) {
      return null;
    }

    try {
      const file = await fs.open(this.bookmarkFile, constants.O_RDWR | constants.O_CREAT);
      return new FileBookmarkHandle(file, this.lock, this.bookmarkFile, this.logger);
    } catch (error) {
      this.logger.error('Failed to open bookmark', {
        bookmarkFile: this.bookmarkFile,
        error: describeError(error)
      });
      await this.lock.release();
      throw error;
    }
  }
}
