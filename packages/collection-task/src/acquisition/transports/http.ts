/**
 * HTTP(S) transport using the global fetch API
 */

import { createWriteStream } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { TransportError, errorMessage } from '../../core/errors.js';
import { withAtomicFile } from '../../core/utils/atomic-write.js';
import type { FetchTransport } from './transport.js';

export interface HttpTransportConfig {
  /** User-Agent header sent with every request */
  readonly userAgent?: string;

  /** Injected for tests; defaults to globalThis.fetch */
  readonly fetch?: typeof fetch;
}

export class HttpTransport implements FetchTransport {
  private readonly fetchImpl: typeof fetch;
  private readonly userAgent: string;

  constructor(config: HttpTransportConfig = {}) {
    this.fetchImpl = config.fetch ?? globalThis.fetch;
    this.userAgent = config.userAgent ?? 'collection-task/1.0';
  }

  async download(url: string, localPath: string): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { 'User-Agent': this.userAgent },
        redirect: 'follow',
      });
    } catch (error) {
      throw new TransportError(url, `Network error: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new TransportError(url, `HTTP ${response.status} ${response.statusText}`.trim(), {
        statusCode: response.status,
      });
    }

    const body = response.body;
    try {
      await withAtomicFile(localPath, async (tempPath) => {
        if (body === null) {
          await writeFile(tempPath, new Uint8Array());
          return;
        }
        await pipeline(Readable.fromWeb(body), createWriteStream(tempPath));
      });
    } catch (error) {
      throw new TransportError(url, `Body read failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
