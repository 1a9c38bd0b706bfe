import { EOL } from 'os';

const SEPARATOR = ':::';

export class Bookmark {
  private constructor(
    private readonly _offset: number,
    private readonly _file: string | null
  ) {
    if (!Number.isSafeInteger(_offset) || _offset < 0) {
      throw new Error(`Bookmark offset must be a non-negative integer, got ${_offset}`);
    }
  }

  public static create(offset: number, file: string): Bookmark {
    if (!file || file.trim().length === 0) {
      throw new Error('Bookmark file cannot be empty');
    }
    return new Bookmark(offset, file);
  }

  public static empty(): Bookmark {
    return new Bookmark(0, null);
  }

  /**
   * Reads the first line of a persisted bookmark. Anything that does not
   * look like `<offset>:::<file>` means "start from scratch".
   */
  public static parse(content: string): Bookmark {
    const firstLine = content.replace(/^\uFEFF/, '').split(/\r?\n/, 1)[0] ?? '';
    const parts = firstLine.split(SEPARATOR).filter(part => part.length > 0);

    if (parts.length !== 2 || !/^\d+$/.test(parts[0])) {
      return Bookmark.empty();
    }

    const offset = Number(parts[0]);
    if (!Number.isSafeInteger(offset)) {
      return Bookmark.empty();
    }

    return new Bookmark(offset, parts[1]);
  }

  public get offset(): number {
    return this._offset;
  }

  public get file(): string | null {
    return this._file;
  }

  public isEmpty(): boolean {
    return this._file === null;
  }

  public format(): string {
    return `${this._offset}${SEPARATOR}${this._file ?? ''}${EOL}`;
  }

  public equals(other: Bookmark): boolean {
    return this._offset === other._offset && this._file === other._file;
  }

  public toString(): string {
    return `${this._offset}${SEPARATOR}${this._file ?? ''}`;
  }
}
