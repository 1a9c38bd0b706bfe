import { promises as fs } from 'fs';
import { Batch, BatchReader } from '../../domain/services/BatchReader';
import { Logger } from '../../application/interfaces/Logger';

const CHUNK_SIZE = 64 * 1024;
const LINE_FEED = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);
const PREVIEW_LENGTH = 1024;
// Enough bytes for PREVIEW_LENGTH characters of any UTF-8 text
const PREVIEW_BYTES = PREVIEW_LENGTH * 4;

/**
 * Reads complete lines forward from a byte offset. Offsets count raw bytes:
 * a leading BOM, each line's UTF-8 bytes and its terminator.
 *
 * An event is measured the same way, so a line is over `maxEventBytes` when
 * the bytes it consumes (BOM and terminator included) are. Once a line is
 * known to be over the limit its remaining bytes are counted, not kept.
 */
export class BufferFileReader implements BatchReader {
  constructor(private readonly logger: Logger) {}

  public async read(
    file: string,
    startOffset: number,
    maxLines: number,
    maxEventBytes?: number | null
  ): Promise<Batch> {
    const lines: string[] = [];
    let nextOffset = startOffset;
    let linesAttempted = 0;

    let parts: Buffer[] = [];
    let lineLength = 0;
    let preview: Buffer | null = null;

    const handle = await fs.open(file, 'r');
    try {
      let chunk = Buffer.alloc(0);
      let position = startOffset;

      while (linesAttempted < maxLines) {
        if (chunk.length === 0) {
          const buffer = Buffer.alloc(CHUNK_SIZE);
          const { bytesRead } = await handle.read(buffer, 0, CHUNK_SIZE, position);
          if (bytesRead === 0) {
            // End of file, or a line the writer has not finished yet
            break;
          }
          position += bytesRead;
          chunk = buffer.subarray(0, bytesRead);
          continue;
        }

        const newlineIndex = chunk.indexOf(LINE_FEED);
        const part = newlineIndex < 0 ? chunk : chunk.subarray(0, newlineIndex);
        lineLength += part.length;

        if (preview === null) {
          parts.push(part);
          // The terminator still to come makes the line at least one byte longer
          if (maxEventBytes != null && lineLength + 1 > maxEventBytes) {
            preview = Buffer.concat(parts).subarray(0, PREVIEW_BYTES);
            parts = [];
          }
        }

        if (newlineIndex < 0) {
          chunk = Buffer.alloc(0);
          continue;
        }
        chunk = chunk.subarray(newlineIndex + 1);

        const lineStart = nextOffset;
        const consumed = lineLength + 1;
        // Dropped lines still count, so one bad line cannot stall the file
        nextOffset += consumed;
        ++linesAttempted;

        if (preview !== null) {
          this.logger.warn('Event exceeds the byte size limit and will be dropped', {
            file,
            limit: maxEventBytes,
            bytes: consumed,
            data: BufferFileReader.decode(preview, lineStart).slice(0, PREVIEW_LENGTH)
          });
        } else {
          const line = BufferFileReader.decode(Buffer.concat(parts, lineLength), lineStart);
          if (line.trim().length > 0) {
            lines.push(line);
          }
        }

        parts = [];
        lineLength = 0;
        preview = null;
      }
    } finally {
      await handle.close();
    }

    return { lines, nextOffset, linesAttempted };
  }

  private static decode(lineBytes: Buffer, lineStart: number): string {
    let bytes = lineBytes;
    if (lineStart === 0 && bytes.subarray(0, UTF8_BOM.length).equals(UTF8_BOM)) {
      bytes = bytes.subarray(UTF8_BOM.length);
    }
    if (bytes.length > 0 && bytes[bytes.length - 1] === CARRIAGE_RETURN) {
      bytes = bytes.subarray(0, bytes.length - 1);
    }
    return bytes.toString('utf8');
  }
}
