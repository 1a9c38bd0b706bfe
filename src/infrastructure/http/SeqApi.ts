import { LogEventLevel, LogEventLevels } from '../../domain/value-objects/LogEventLevel';

export const BULK_UPLOAD_RESOURCE = 'api/events/raw';
export const API_KEY_HEADER_NAME = 'X-Seq-ApiKey';

export class SeqApi {
  /**
   * A base address without a trailing slash would lose its last path
   * segment when relative resources are resolved against it.
   */
  public static normalizeServerBaseAddress(serverUrl: string): URL {
    const baseUri = serverUrl.endsWith('/') ? serverUrl : `${serverUrl}/`;
    return new URL(baseUri);
  }

  public static bulkUploadUrl(serverUrl: string): URL {
    return new URL(BULK_UPLOAD_RESOURCE, SeqApi.normalizeServerBaseAddress(serverUrl));
  }

  /**
   * Pulls `MinimumLevelAccepted` out of an ingestion reply, if present.
   */
  public static readMinimumLevelAccepted(responseBody: string): LogEventLevel | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(responseBody);
    } catch (error) {
      return null;
    }

    if (typeof parsed !== 'object' || parsed === null || !('MinimumLevelAccepted' in parsed)) {
      return null;
    }

    const level = parsed.MinimumLevelAccepted;
    return typeof level === 'string' ? LogEventLevels.parse(level) : null;
  }
}
