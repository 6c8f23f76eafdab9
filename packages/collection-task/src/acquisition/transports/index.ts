export type { FetchTransport, TransportScheme, TransportSet } from './transport.js';
export { schemeOf, selectTransport } from './transport.js';
export { HttpTransport, type HttpTransportConfig } from './http.js';
export { S3Transport, parseS3Url, type S3Location } from './s3.js';

import { S3Client } from '@aws-sdk/client-s3';
import { HttpTransport } from './http.js';
import { S3Transport } from './s3.js';
import type { TransportSet } from './transport.js';

/**
 * Transports for a process, with one shared S3 client
 */
export function createDefaultTransports(options: {
  readonly s3Client?: S3Client;
  readonly userAgent?: string;
} = {}): TransportSet {
  return {
    s3: new S3Transport(options.s3Client ?? new S3Client({})),
    http: new HttpTransport({ userAgent: options.userAgent }),
  };
}
