import { promises as fs } from 'fs';
import { join } from 'path';
import { randomBytes } from 'crypto';
import { QuarantineRepository } from '../../domain/repositories/QuarantineRepository';
import { Logger } from '../../application/interfaces/Logger';
import { describeError } from '../filesystem/errors';

export class FileSystemQuarantineRepository implements QuarantineRepository {
  constructor(
    private readonly logFolder: string,
    private readonly logger: Logger
  ) {}

  public async save(statusCode: number, payload: string): Promise<string> {
    const filePath = join(
      this.logFolder,
      `invalid-${statusCode}-${randomBytes(16).toString('hex')}.json`
    );

    try {
      await fs.writeFile(filePath, payload, 'utf8');
      return filePath;
    } catch (error) {
      this.logger.error('Failed to write quarantined payload', {
        filePath,
        error: describeError(error)
      });
      throw error;
    }
  }
}
