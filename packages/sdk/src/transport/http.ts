/**
 * HTTP transport for the delta endpoint
 * @module transport/http
 */

import { ConnectivityLostError, TransientTransportError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { CLIENT_ID_HEADER, SYNC_PATH, syncResponseSchema } from '../sync/protocol.js';
import type { SyncRequest, SyncResponse } from '../sync/protocol.js';
import { JSON_CONTENT_TYPE, PayloadCodec } from './codec.js';
import type { CompressionLevel } from './codec.js';
import type { ExchangeOptions, SyncTransport } from './index.js';

export interface HttpTransportConfig {
  /**
   * Base URL of the authority, without the endpoint path
   */
  url: string;
  headers?: Record<string, string>;
  /**
   * Sent as `X-Client-Id`; the authority records it as the writer
   */
  clientId?: string;
  /**
   * Enable data compression (MessagePack + DEFLATE)
   * @default true
   */
  enableCompression?: boolean;
  /**
   * DEFLATE level for request bodies
   * @default 6
   */
  compressionLevel?: CompressionLevel;
  fetch?: typeof fetch;
  logger?: Logger;
}

export class HttpTransport implements SyncTransport {
  private config: Required<Omit<HttpTransportConfig, 'clientId' | 'compressionLevel' | 'logger'>> & {
    clientId?: string;
  };
  private codec: PayloadCodec;
  private responseCodec = new PayloadCodec();
  private logger?: Logger;

  constructor(config: HttpTransportConfig) {
    const { compressionLevel, logger, ...rest } = config;
    this.config = {
      headers: {},
      enableCompression: true,
      fetch: (input, init) => fetch(input, init),
      ...rest,
    };
    this.codec = new PayloadCodec(compressionLevel === undefined ? {} : { compressionLevel });
    this.logger = logger?.child({ module: 'transport' });
  }

  async exchange(request: SyncRequest, options: ExchangeOptions = {}): Promise<SyncResponse> {
    const headers: Record<string, string> = { ...this.config.headers };
    if (this.config.clientId) {
      headers[CLIENT_ID_HEADER] = this.config.clientId;
    }

    let body: string | Uint8Array;
    if (this.config.enableCompression) {
      headers['content-type'] = this.codec.contentType;
      headers.accept = `${this.codec.contentType}, ${JSON_CONTENT_TYPE}`;
      body = new Uint8Array(this.codec.encode(request));
    } else {
      headers['content-type'] = JSON_CONTENT_TYPE;
      headers.accept = JSON_CONTENT_TYPE;
      body = JSON.stringify(request);
    }

    let response: Response;
    try {
      response = await this.config.fetch(`${this.config.url}${SYNC_PATH}`, {
        method: 'POST',
        headers,
        body,
        signal: options.signal,
      });
    } catch (error) {
      throw new ConnectivityLostError(
        options.signal?.aborted
          ? 'Sync exchange aborted'
          : `Authority unreachable: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new TransientTransportError(`Authority answered ${response.status}`, {
        status: response.status,
      });
    }

    let raw: unknown;
    try {
      const contentType = response.headers.get('content-type') ?? '';
      raw = contentType.includes('msgpack')
        ? this.responseCodec.decode(new Uint8Array(await response.arrayBuffer()))
        : await response.json();
    } catch (error) {
      if (options.signal?.aborted) {
        throw new ConnectivityLostError('Sync exchange aborted', { cause: error });
      }
      throw new TransientTransportError(`Unreadable sync response: ${errorMessage(error)}`, {
        status: response.status,
        cause: error,
      });
    }

    const parsed = syncResponseSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger?.warn({ issues: parsed.error.issues.length }, 'malformed sync response');
      throw new TransientTransportError(`Malformed sync response: ${parsed.error.message}`, {
        status: response.status,
      });
    }

    return parsed.data;
  }
}
