/**
 * Object storage transport for s3:// URLs
 *
 * Credentials and region come from the AWS SDK default provider chain; this
 * module never configures them.
 */

import { createWriteStream } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { GetObjectCommand, S3Client, S3ServiceException } from '@aws-sdk/client-s3';
import { TransportError, errorMessage } from '../../core/errors.js';
import { withAtomicFile } from '../../core/utils/atomic-write.js';
import type { FetchTransport } from './transport.js';

export interface S3Location {
  readonly bucket: string;
  readonly key: string;
}

/**
 * Split s3://bucket/path/to/key into bucket and key
 */
export function parseS3Url(url: string): S3Location {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(url);
  if (!match) {
    throw new TransportError(url, `Malformed S3 URL: ${url}`);
  }
  return { bucket: match[1], key: match[2] };
}

export class S3Transport implements FetchTransport {
  private readonly client: S3Client;

  /**
   * @param client - Shared client, built once per process
   */
  constructor(client: S3Client = new S3Client({})) {
    this.client = client;
  }

  async download(url: string, localPath: string): Promise<void> {
    const { bucket, key } = parseS3Url(url);

    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      const body = response.Body;
      if (body === undefined) {
        throw new TransportError(url, 'Empty response body');
      }

      await withAtomicFile(localPath, async (tempPath) => {
        if (body instanceof Readable) {
          await pipeline(body, createWriteStream(tempPath));
        } else {
          await writeFile(tempPath, await body.transformToByteArray());
        }
      });
    } catch (error) {
      if (error instanceof TransportError) throw error;
      const statusCode =
        error instanceof S3ServiceException ? error.$metadata.httpStatusCode : undefined;
      throw new TransportError(url, errorMessage(error), { statusCode, cause: error });
    }
  }
}
