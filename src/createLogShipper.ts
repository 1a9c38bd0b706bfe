import { ShippingCoordinator } from './application/services/ShippingCoordinator';
import { Logger } from './application/interfaces/Logger';
import { LoggingLevelSwitch } from './domain/entities/LoggingLevelSwitch';
import { FileSystemBookmarkRepository } from './infrastructure/repositories/FileSystemBookmarkRepository';
import { FileSystemQuarantineRepository } from './infrastructure/repositories/FileSystemQuarantineRepository';
import { FileSystemBufferFileSet } from './infrastructure/filesystem/FileSystemBufferFileSet';
import { BufferFileReader } from './infrastructure/filesystem/BufferFileReader';
import { HttpDeliveryClient, HttpTransport } from './infrastructure/http/HttpDeliveryClient';

export interface LogShipperOptions {
  serverUrl: string;
  bufferBaseFilename: string;
  apiKey?: string;
  batchPostingLimit: number;
  periodMs: number;
  eventBodyLimitBytes?: number | null;
  levelSwitch?: LoggingLevelSwitch | null;
  transport?: HttpTransport;
  clock?: () => number;
}

/**
 * Wire the filesystem and HTTP implementations into a coordinator. The
 * returned shipper is not started.
 */
export function createLogShipper(options: LogShipperOptions, logger: Logger): ShippingCoordinator {
  const bookmarks = new FileSystemBookmarkRepository(options.bufferBaseFilename, logger);

  return new ShippingCoordinator(
    bookmarks,
    new FileSystemBufferFileSet(options.bufferBaseFilename, logger),
    new BufferFileReader(logger),
    new HttpDeliveryClient(
      { serverUrl: options.serverUrl, apiKey: options.apiKey, transport: options.transport },
      logger
    ),
    new FileSystemQuarantineRepository(bookmarks.folder, logger),
    logger,
    {
      batchPostingLimit: options.batchPostingLimit,
      periodMs: options.periodMs,
      eventBodyLimitBytes: options.eventBodyLimitBytes,
      levelSwitch: options.levelSwitch,
      clock: options.clock
    }
  );
}
