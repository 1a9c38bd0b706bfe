export interface Batch {
  /** Raw JSON documents, in file order */
  readonly lines: string[];
  /** Where the next read should start */
  readonly nextOffset: number;
  /** Lines consumed, including dropped ones */
  readonly linesAttempted: number;
}

export interface BatchReader {
  read(
    file: string,
    startOffset: number,
    maxLines: number,
    maxEventBytes?: number | null
  ): Promise<Batch>;
}
