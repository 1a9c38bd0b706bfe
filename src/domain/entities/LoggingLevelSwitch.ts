import { LogEventLevel, LogEventLevels } from '../value-objects/LogEventLevel';

/**
 * Shared, mutable minimum-level cell.
 *
 * The shipper writes it from server feedback; upstream loggers read it to
 * decide which events are worth buffering at all.
 */
export class LoggingLevelSwitch {
  private level: LogEventLevel;

  constructor(initialLevel: LogEventLevel = LogEventLevels.MINIMUM) {
    this.level = initialLevel;
  }

  public get minimumLevel(): LogEventLevel {
    return this.level;
  }

  public set minimumLevel(level: LogEventLevel) {
    this.level = level;
  }

  public isEnabled(level: LogEventLevel): boolean {
    return LogEventLevels.isAtLeast(level, this.level);
  }
}
