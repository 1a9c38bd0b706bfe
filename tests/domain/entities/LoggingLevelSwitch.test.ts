import { LoggingLevelSwitch } from '../../../src/domain/entities/LoggingLevelSwitch';
import { LogEventLevel } from '../../../src/domain/value-objects/LogEventLevel';

describe('LoggingLevelSwitch', () => {
  it('should start at the most permissive level by default', () => {
    const levelSwitch = new LoggingLevelSwitch();

    expect(levelSwitch.minimumLevel).toBe(LogEventLevel.VERBOSE);
    expect(levelSwitch.isEnabled(LogEventLevel.VERBOSE)).toBe(true);
  });

  it('should filter levels below the current minimum', () => {
    const levelSwitch = new LoggingLevelSwitch(LogEventLevel.WARNING);

    expect(levelSwitch.isEnabled(LogEventLevel.INFORMATION)).toBe(false);
    expect(levelSwitch.isEnabled(LogEventLevel.WARNING)).toBe(true);
    expect(levelSwitch.isEnabled(LogEventLevel.FATAL)).toBe(true);
  });

  it('should reflect updates to every holder of the same switch', () => {
    const levelSwitch = new LoggingLevelSwitch(LogEventLevel.DEBUG);
    const reader: { readonly minimumLevel: LogEventLevel } = levelSwitch;

    levelSwitch.minimumLevel = LogEventLevel.ERROR;

    expect(reader.minimumLevel).toBe(LogEventLevel.ERROR);
  });
});
