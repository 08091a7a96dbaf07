/**
 * Transport module - one request/response exchange with the authority
 * @module transport
 */

import type { SyncRequest, SyncResponse } from '../sync/protocol.js';

export interface ExchangeOptions {
  signal?: AbortSignal;
}

/**
 * Anything that can carry a delta request to the authority.
 *
 * Implementations throw `ConnectivityLostError` when the request never
 * completed and `TransientTransportError` when the authority answered
 * with something unusable.
 */
export interface SyncTransport {
  exchange(request: SyncRequest, options?: ExchangeOptions): Promise<SyncResponse>;
}

export { HttpTransport } from './http.js';
export type { HttpTransportConfig } from './http.js';
export { JSON_CONTENT_TYPE, MSGPACK_CONTENT_TYPE, PayloadCodec } from './codec.js';
export type { CodecOptions, CodecStats, CompressionLevel } from './codec.js';
