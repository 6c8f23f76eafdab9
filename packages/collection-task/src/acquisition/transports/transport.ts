/**
 * Fetch transport contract and scheme dispatch
 */

import { UnsupportedSchemeError } from '../../core/errors.js';

/**
 * Copies one remote object to a local path
 *
 * Implementations write atomically and throw on any failure; retry lives in
 * the fetcher, not here.
 */
export interface FetchTransport {
  download(url: string, localPath: string): Promise<void>;
}

export type TransportScheme = 's3' | 'http';

export interface TransportSet {
  readonly s3: FetchTransport;
  readonly http: FetchTransport;
}

/**
 * Scheme for a URL, by prefix
 */
export function schemeOf(url: string): TransportScheme | null {
  if (url.startsWith('s3://')) return 's3';
  if (url.startsWith('https://') || url.startsWith('http://')) return 'http';
  return null;
}

/**
 * Transport responsible for `url`
 *
 * @throws UnsupportedSchemeError for anything but s3:// and http(s)://
 */
export function selectTransport(transports: TransportSet, url: string): FetchTransport {
  const scheme = schemeOf(url);
  if (scheme === null) {
    throw new UnsupportedSchemeError(url);
  }
  return transports[scheme];
}
