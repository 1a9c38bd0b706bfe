export enum LogEventLevel {
  VERBOSE = 'Verbose',
  DEBUG = 'Debug',
  INFORMATION = 'Information',
  WARNING = 'Warning',
  ERROR = 'Error',
  FATAL = 'Fatal'
}

const ORDERED_LEVELS: readonly LogEventLevel[] = [
  LogEventLevel.VERBOSE,
  LogEventLevel.DEBUG,
  LogEventLevel.INFORMATION,
  LogEventLevel.WARNING,
  LogEventLevel.ERROR,
  LogEventLevel.FATAL
];

export class LogEventLevels {
  /**
   * The most permissive level; used when the server has not said otherwise.
   */
  public static readonly MINIMUM = LogEventLevel.VERBOSE;

  public static parse(value: string | null | undefined): LogEventLevel | null {
    if (!value) {
      return null;
    }

    const normalized = value.trim().toLowerCase();
    return ORDERED_LEVELS.find(level => level.toLowerCase() === normalized) ?? null;
  }

  public static severity(level: LogEventLevel): number {
    return ORDERED_LEVELS.indexOf(level);
  }

  public static isAtLeast(level: LogEventLevel, minimum: LogEventLevel): boolean {
    return LogEventLevels.severity(level) >= LogEventLevels.severity(minimum);
  }
}
