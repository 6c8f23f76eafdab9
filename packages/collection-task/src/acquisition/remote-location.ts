/**
 * Remote Collection Location
 *
 * Collection files are published under `<root>/<collection>-collection/`,
 * where root is either an S3 bucket or an HTTP(S) base URL. The bucket wins
 * when both are given.
 */

import { ConfigurationError } from '../core/errors.js';
import { RemoteLocationSchema, parseOptions, type RemoteLocationOptions } from '../core/config.js';

export class RemoteLocation {
  private readonly root: string;
  readonly collectionName: string;
  readonly sourceType: 'S3' | 'HTTP(S)';

  private constructor(root: string, collectionName: string, sourceType: 'S3' | 'HTTP(S)') {
    this.root = root;
    this.collectionName = collectionName;
    this.sourceType = sourceType;
  }

  /**
   * Validate options and build a location
   *
   * @throws ConfigurationError when neither bucket nor base URL is given
   */
  static from(raw: Partial<RemoteLocationOptions>): RemoteLocation {
    const options = parseOptions(RemoteLocationSchema, raw);
    if (options.bucket !== undefined) {
      return new RemoteLocation(`s3://${options.bucket}`, options.collectionName, 'S3');
    }
    if (options.baseUrl !== undefined) {
      const base = options.baseUrl.replace(/\/+$/, '');
      return new RemoteLocation(base, options.collectionName, 'HTTP(S)');
    }
    throw new ConfigurationError('Either bucket or base URL must be provided');
  }

  /**
   * URL of a file relative to the collection root
   */
  url(relativePath: string): string {
    const path = relativePath.replace(/^\/+/, '');
    return `${this.root}/${this.collectionName}-collection/${path}`;
  }

  /**
   * URL of a raw resource file
   */
  resourceUrl(resource: string): string {
    return this.url(`collection/resource/${resource}`);
  }
}
