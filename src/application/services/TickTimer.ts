import { Logger } from '../interfaces/Logger';

/**
 * One-shot timer that never overlaps its own callback. The owner re-arms it
 * once a tick has finished.
 */
export class TickTimer {
  private timeout?: NodeJS.Timeout;
  private running?: Promise<void>;
  private disposed = false;

  constructor(
    private readonly onTick: () => Promise<void>,
    private readonly logger: Logger
  ) {}

  public get isRunning(): boolean {
    return this.running !== undefined;
  }

  public get isArmed(): boolean {
    return this.timeout !== undefined;
  }

  public start(delayMs: number): void {
    if (this.disposed) {
      throw new Error('Cannot start a disposed timer');
    }

    if (this.timeout) {
      clearTimeout(this.timeout);
    }

    this.timeout = setTimeout(() => {
      this.timeout = undefined;
      this.fire();
    }, delayMs);
  }

  /**
   * Cancel any pending tick and wait for one already in flight.
   */
  public async dispose(): Promise<void> {
    this.disposed = true;

    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = undefined;
    }

    if (this.running) {
      await this.running;
    }
  }

  private fire(): void {
    if (this.disposed) {
      return;
    }

    if (this.running) {
      this.logger.warn('Previous tick still running; skipping');
      return;
    }

    this.running = this.onTick()
      .catch(error => {
        this.logger.error('Unhandled error in timer tick', {
          error: error instanceof Error ? error.message : String(error)
        });
      })
      .finally(() => {
        this.running = undefined;
      });
  }
}
