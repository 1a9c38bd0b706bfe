import { DeliveryOutcome, DeliveryService } from '../../domain/services/DeliveryService';
import { Logger } from '../../application/interfaces/Logger';
import { describeError } from '../filesystem/errors';
import { API_KEY_HEADER_NAME, SeqApi } from './SeqApi';

export interface HttpResponseLike {
  readonly status: number;
  text(): Promise<string>;
}

export interface HttpRequestInit {
  method: 'POST';
  headers: Record<string, string>;
  body: string;
}

export type HttpTransport = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

export const fetchTransport: HttpTransport = (url, init) => fetch(url, init);

const BAD_REQUEST = 400;
const PAYLOAD_TOO_LARGE = 413;

export interface HttpDeliveryClientOptions {
  serverUrl: string;
  apiKey?: string;
  transport?: HttpTransport;
}

export class HttpDeliveryClient implements DeliveryService {
  private readonly endpoint: string;
  private readonly apiKey?: string;
  private readonly transport: HttpTransport;

  constructor(options: HttpDeliveryClientOptions, private readonly logger: Logger) {
    this.endpoint = SeqApi.bulkUploadUrl(options.serverUrl).toString();
    this.apiKey = options.apiKey;
    this.transport = options.transport ?? fetchTransport;
  }

  public get url(): string {
    return this.endpoint;
  }

  /**
   * Lines are already JSON documents and are embedded as they are.
   */
  public static buildPayload(lines: readonly string[]): string {
    return `{"Events":[${lines.join(',')}]}`;
  }

  public async deliver(lines: readonly string[]): Promise<DeliveryOutcome> {
    const payload = HttpDeliveryClient.buildPayload(lines);
    const headers: Record<string, string> = {
      'Content-Type': 'application/json; charset=utf-8'
    };
    if (this.apiKey && this.apiKey.trim().length > 0) {
      headers[API_KEY_HEADER_NAME] = this.apiKey;
    }

    let response: HttpResponseLike;
    try {
      response = await this.transport(this.endpoint, { method: 'POST', headers, body: payload });
    } catch (error) {
      return { kind: 'transient', error: describeError(error) };
    }

    const body = await this.readBody(response);

    if (response.status >= 200 && response.status < 300) {
      return {
        kind: 'accepted',
        minimumLevelAccepted: SeqApi.readMinimumLevelAccepted(body)
      };
    }

    if (response.status === BAD_REQUEST || response.status === PAYLOAD_TOO_LARGE) {
      return { kind: 'rejected', status: response.status, body, payload };
    }

    return { kind: 'transient', status: response.status, body };
  }

  private async readBody(response: HttpResponseLike): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      this.logger.debug('Failed to read response body', {
        status: response.status,
        error: describeError(error)
      });
      return '';
    }
  }
}
