import { Bookmark } from '../../domain/value-objects/Bookmark';
import { LogEventLevel, LogEventLevels } from '../../domain/value-objects/LogEventLevel';
import { ShippingState, ShippingStateValidator } from '../../domain/value-objects/ShippingState';
import { LoggingLevelSwitch } from '../../domain/entities/LoggingLevelSwitch';
import { BookmarkHandle, BookmarkRepository } from '../../domain/repositories/BookmarkRepository';
import { QuarantineRepository } from '../../domain/repositories/QuarantineRepository';
import { BatchReader } from '../../domain/services/BatchReader';
import { BufferFileSet } from '../../domain/services/BufferFileSet';
import { DeliveryOutcome, DeliveryService } from '../../domain/services/DeliveryService';
import { Logger } from '../interfaces/Logger';
import { TickTimer } from './TickTimer';

/** The server's level is re-read at least this often, even with nothing to ship */
export const REQUIRED_LEVEL_CHECK_INTERVAL_MS = 2 * 60 * 1000;

export interface ShippingOptions {
  batchPostingLimit: number;
  periodMs: number;
  eventBodyLimitBytes?: number | null;
  levelSwitch?: LoggingLevelSwitch | null;
  clock?: () => number;
}

interface DrainResult {
  attempted: boolean;
  minimumAcceptedLevel: LogEventLevel | null;
}

export class ShippingCoordinator {
  private readonly timer: TickTimer;
  private readonly clock: () => number;
  private levelSwitch: LoggingLevelSwitch | null;
  private nextRequiredLevelCheck: number;
  private state: ShippingState = ShippingState.IDLE;
  private started = false;
  private unloading = false;
  private closing?: Promise<void>;

  constructor(
    private readonly bookmarks: BookmarkRepository,
    private readonly fileSet: BufferFileSet,
    private readonly reader: BatchReader,
    private readonly delivery: DeliveryService,
    private readonly quarantine: QuarantineRepository,
    private readonly logger: Logger,
    private readonly options: ShippingOptions
  ) {
    if (!Number.isInteger(options.batchPostingLimit) || options.batchPostingLimit <= 0) {
      throw new Error('batchPostingLimit must be a positive integer');
    }

    this.clock = options.clock ?? Date.now;
    this.levelSwitch = options.levelSwitch ?? null;
    this.nextRequiredLevelCheck = this.clock() + REQUIRED_LEVEL_CHECK_INTERVAL_MS;
    this.timer = new TickTimer(() => this.tick(), logger);
  }

  /**
   * Last minimum level indicated by the server, if any.
   */
  public get minimumAcceptedLevel(): LogEventLevel | null {
    return this.levelSwitch?.minimumLevel ?? null;
  }

  public get currentState(): ShippingState {
    return this.state;
  }

  public start(): void {
    if (this.unloading) {
      this.logger.warn('Shipper is shutting down; not starting');
      return;
    }
    if (this.started) {
      return;
    }

    this.started = true;
    this.timer.start(this.options.periodMs);
    this.logger.info('Log shipping started', {
      periodMs: this.options.periodMs,
      batchPostingLimit: this.options.batchPostingLimit
    });
  }

  /**
   * Stop the timer, wait for a tick in flight, then ship whatever is left.
   */
  public close(): Promise<void> {
    if (!this.closing) {
      this.unloading = true;
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  /**
   * One shipping round: lock, drain full batches, settle. Never rejects.
   */
  public async tick(): Promise<void> {
    let result: DrainResult | null = null;
    let skipped = false;

    this.transition(ShippingState.LOCKING);
    try {
      // Holding the bookmark lock is what keeps several shippers from
      // sending the same lines.
      const handle = await this.bookmarks.open();
      if (!handle) {
        skipped = true;
        this.logger.debug('Bookmark is locked by another shipper; skipping tick');
      } else {
        try {
          result = await this.drain(handle);
        } finally {
          await handle.close();
        }
      }
    } catch (error) {
      this.logger.error('Exception while emitting periodic batch', {
        error: error instanceof Error ? error.message : String(error)
      });
      result = { attempted: true, minimumAcceptedLevel: null };
    } finally {
      this.transition(ShippingState.SETTLING);

      if (!skipped && result?.attempted) {
        this.applyMinimumAcceptedLevel(result.minimumAcceptedLevel);
      }

      this.transition(ShippingState.IDLE);
      if (this.started && !this.unloading) {
        this.timer.start(this.options.periodMs);
      }
    }
  }

  private async drain(handle: BookmarkHandle): Promise<DrainResult> {
    const { batchPostingLimit, eventBodyLimitBytes } = this.options;
    const result: DrainResult = { attempted: false, minimumAcceptedLevel: null };
    let linesAttempted: number;

    do {
      linesAttempted = 0;
      this.transition(ShippingState.READING);

      const bookmark = await handle.read();
      const fileSet = await this.fileSet.list();

      let offset = bookmark.offset;
      let currentFile = bookmark.file;
      if (currentFile === null || !(await this.fileSet.exists(currentFile))) {
        offset = 0;
        currentFile = fileSet[0] ?? null;
      }

      if (currentFile === null) {
        break;
      }

      const batch = await this.reader.read(currentFile, offset, batchPostingLimit, eventBodyLimitBytes);
      linesAttempted = batch.linesAttempted;

      if (linesAttempted === 0 && !this.isLevelCheckDue()) {
        this.transition(ShippingState.NO_DATA);
        await this.cleanUpFileSet(handle, fileSet, currentFile, offset);
        this.transition(ShippingState.SETTLING);
        continue;
      }

      this.transition(ShippingState.SHIPPING);
      this.nextRequiredLevelCheck = this.clock() + REQUIRED_LEVEL_CHECK_INTERVAL_MS;

      const outcome = await this.delivery.deliver(batch.lines);
      result.attempted = true;
      // A failure later in the drain does not undo a level the server already sent
      if (outcome.kind === 'accepted') {
        result.minimumAcceptedLevel = outcome.minimumLevelAccepted;
      }

      const advanced = await this.settle(
        handle,
        outcome,
        Bookmark.create(batch.nextOffset, currentFile),
        batch.lines.length
      );
      this.transition(ShippingState.SETTLING);

      if (!advanced) {
        break;
      }
    } while (linesAttempted === batchPostingLimit);

    return result;
  }

  private async settle(
    handle: BookmarkHandle,
    outcome: DeliveryOutcome,
    next: Bookmark,
    eventCount: number
  ): Promise<boolean> {
    switch (outcome.kind) {
      case 'accepted':
        await handle.write(next);
        this.logger.debug('Shipped batch', {
          file: next.file,
          events: eventCount,
          nextOffset: next.offset
        });
        return true;

      case 'rejected': {
        // The batch will never be accepted as built; keep it for an operator
        // and move past it.
        const invalidPayloadFile = await this.quarantine.save(outcome.status, outcome.payload);
        this.logger.error('HTTP shipping failed; payload dumped', {
          status: outcome.status,
          body: outcome.body,
          invalidPayloadFile
        });
        await handle.write(next);
        return true;
      }

      case 'transient':
        this.logger.warn('Received failed HTTP shipping result', {
          status: outcome.status,
          body: outcome.body,
          error: outcome.error
        });
        return false;
    }
  }

  /**
   * Runs only when the current file had nothing to read.
   */
  private async cleanUpFileSet(
    handle: BookmarkHandle,
    fileSet: string[],
    currentFile: string,
    offset: number
  ): Promise<void> {
    // Only move on if no other process has the current file open and its
    // length is as we found it.
    if (
      fileSet.length === 2 &&
      fileSet[0] === currentFile &&
      (await this.fileSet.isUnlockedAtLength(currentFile, offset))
    ) {
      await handle.write(Bookmark.create(0, fileSet[1]));
      this.logger.info('Rolled over to next buffer file', { from: currentFile, to: fileSet[1] });
    }

    if (fileSet.length > 2) {
      // A third file means the writer has moved past the oldest one
      const oldest = fileSet[0];
      try {
        await this.fileSet.remove(oldest);
      } catch (error) {
        this.logger.warn('Failed to delete buffer file', {
          file: oldest,
          error: error instanceof Error ? error.message : String(error)
        });
        return;
      }

      this.logger.info('Deleted shipped buffer file', { file: oldest });
      if (oldest === currentFile) {
        await handle.write(Bookmark.create(0, fileSet[1]));
      }
    }
  }

  private isLevelCheckDue(): boolean {
    return this.levelSwitch !== null && this.nextRequiredLevelCheck < this.clock();
  }

  private applyMinimumAcceptedLevel(level: LogEventLevel | null): void {
    if (level === null) {
      if (this.levelSwitch) {
        this.levelSwitch.minimumLevel = LogEventLevels.MINIMUM;
      }
      return;
    }

    if (this.levelSwitch) {
      this.levelSwitch.minimumLevel = level;
    } else {
      this.levelSwitch = new LoggingLevelSwitch(level);
    }
  }

  private async shutdown(): Promise<void> {
    await this.timer.dispose();
    await this.tick();
    this.transition(ShippingState.SHUTTING_DOWN);
    this.logger.info('Log shipping stopped');
  }

  private transition(next: ShippingState): void {
    if (this.state === next) {
      return;
    }

    if (!ShippingStateValidator.isValidTransition(this.state, next)) {
      this.logger.warn('Unexpected shipping state transition', { from: this.state, to: next });
    }
    this.state = next;
  }
}
