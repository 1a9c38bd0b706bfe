import { LogEventLevel, LogEventLevels } from '../../../src/domain/value-objects/LogEventLevel';

describe('LogEventLevel Value Object', () => {
  describe('parse', () => {
    it('should match level names regardless of case', () => {
      expect(LogEventLevels.parse('Warning')).toBe(LogEventLevel.WARNING);
      expect(LogEventLevels.parse('warning')).toBe(LogEventLevel.WARNING);
      expect(LogEventLevels.parse(' FATAL ')).toBe(LogEventLevel.FATAL);
    });

    it('should return null for unknown or missing names', () => {
      expect(LogEventLevels.parse('Critical')).toBeNull();
      expect(LogEventLevels.parse('')).toBeNull();
      expect(LogEventLevels.parse(null)).toBeNull();
      expect(LogEventLevels.parse(undefined)).toBeNull();
    });
  });

  describe('ordering', () => {
    it('should treat Verbose as the most permissive level', () => {
      expect(LogEventLevels.MINIMUM).toBe(LogEventLevel.VERBOSE);
    });

    it('should order levels from Verbose to Fatal', () => {
      expect(LogEventLevels.severity(LogEventLevel.VERBOSE)).toBe(0);
      expect(LogEventLevels.severity(LogEventLevel.INFORMATION)).toBe(2);
      expect(LogEventLevels.severity(LogEventLevel.FATAL)).toBe(5);
    });

    it('should compare against a minimum', () => {
      expect(LogEventLevels.isAtLeast(LogEventLevel.ERROR, LogEventLevel.WARNING)).toBe(true);
      expect(LogEventLevels.isAtLeast(LogEventLevel.WARNING, LogEventLevel.WARNING)).toBe(true);
      expect(LogEventLevels.isAtLeast(LogEventLevel.DEBUG, LogEventLevel.WARNING)).toBe(false);
    });
  });
});
