import { SeqApi } from '../../../src/infrastructure/http/SeqApi';
import { LogEventLevel } from '../../../src/domain/value-objects/LogEventLevel';

describe('SeqApi', () => {
  describe('normalizeServerBaseAddress', () => {
    it('should append a trailing slash to keep the sub-path', () => {
      const uri = SeqApi.normalizeServerBaseAddress('https://seq.example.com/seq');

      expect(uri.pathname).toBe('/seq/');
      expect(uri.href).toBe('https://seq.example.com/seq/');
    });

    it('should leave an address that already ends with a slash alone', () => {
      expect(SeqApi.normalizeServerBaseAddress('http://localhost:5341/').href).toBe('http://localhost:5341/');
    });

    it('should reject a relative address', () => {
      expect(() => SeqApi.normalizeServerBaseAddress('seq.example.com')).toThrow();
    });
  });

  describe('bulkUploadUrl', () => {
    it('should resolve the raw events resource under the server root', () => {
      expect(SeqApi.bulkUploadUrl('http://localhost:5341').toString()).toBe(
        'http://localhost:5341/api/events/raw'
      );
    });

    it('should preserve a sub-path', () => {
      expect(SeqApi.bulkUploadUrl('https://seq.example.com/seq').toString()).toBe(
        'https://seq.example.com/seq/api/events/raw'
      );
    });
  });

  describe('readMinimumLevelAccepted', () => {
    it('should read the level advertised by the server', () => {
      expect(SeqApi.readMinimumLevelAccepted('{"MinimumLevelAccepted":"Warning"}')).toBe(
        LogEventLevel.WARNING
      );
    });

    it.each([
      ['an empty body', ''],
      ['invalid JSON', '<html>'],
      ['a reply without the field', '{}'],
      ['a null level', '{"MinimumLevelAccepted":null}'],
      ['an unknown level', '{"MinimumLevelAccepted":"Loud"}'],
      ['a non-string level', '{"MinimumLevelAccepted":3}'],
      ['an array', '[1,2]'],
    ])('should return null for %s', (_description, body) => {
      expect(SeqApi.readMinimumLevelAccepted(body)).toBeNull();
    });
  });
});
