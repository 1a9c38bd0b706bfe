export interface BufferFileSet {
  /**
   * Absolute paths of the buffer files, oldest first
   */
  list(): Promise<string[]>;

  exists(file: string): Promise<boolean>;

  remove(file: string): Promise<void>;

  /**
   * True only when nothing else has the file open and it has not grown
   * past `maxLength` bytes.
   */
  isUnlockedAtLength(file: string, maxLength: number): Promise<boolean>;
}
