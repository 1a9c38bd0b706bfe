import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { FileSystemQuarantineRepository } from '../../../src/infrastructure/repositories/FileSystemQuarantineRepository';
import { Logger } from '../../../src/application/interfaces/Logger';

describe('FileSystemQuarantineRepository', () => {
  let testDir: string;
  let mockLogger: jest.Mocked<Logger>;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(join(tmpdir(), 'quarantine-'));
    mockLogger = {
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
    };
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('should write the payload to a file named after the status code', async () => {
    const repository = new FileSystemQuarantineRepository(testDir, mockLogger);
    const payload = '{"Events":[{"a":1}]}';

    const filePath = await repository.save(400, payload);

    expect(filePath.startsWith(join(testDir, 'invalid-400-'))).toBe(true);
    expect(filePath).toMatch(/invalid-400-[0-9a-f]{32}\.json$/);
    await expect(fs.readFile(filePath, 'utf8')).resolves.toBe(payload);
  });

  it('should never reuse a file name', async () => {
    const repository = new FileSystemQuarantineRepository(testDir, mockLogger);

    const first = await repository.save(413, '{"Events":[]}');
    const second = await repository.save(413, '{"Events":[]}');

    expect(first).not.toBe(second);
  });

  it('should log and rethrow when the folder is missing', async () => {
    const repository = new FileSystemQuarantineRepository(join(testDir, 'missing'), mockLogger);

    await expect(repository.save(400, '{}')).rejects.toThrow();
    expect(mockLogger.error).toHaveBeenCalledWith(
      'Failed to write quarantined payload',
      expect.objectContaining({ error: expect.any(String) })
    );
  });
});
