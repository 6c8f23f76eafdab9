/**
 * Collection Task Configuration
 *
 * Zod schemas for the options every workflow accepts, plus the directory
 * layout defaults shared by the transform and download steps.
 *
 * TYPE SAFETY: Options are validated once at the workflow boundary; the core
 * below it only ever sees parsed, immutable values.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_MAX_THREADS = 4;
export const DEFAULT_MAX_RETRIES = 5;

/**
 * Output directory layout (relative to the working directory)
 */
export const DEFAULT_DIRS = {
  pipelineDir: 'pipeline/',
  specificationDir: 'specification/',
  cacheDir: 'var/cache/',
  transformedDir: 'transformed/',
  issueDir: 'issue/',
  operationalIssueDir: 'performance/operational_issue/',
  outputLogDir: 'log/',
  columnFieldDir: 'var/column-field/',
  datasetResourceDir: 'var/dataset-resource/',
  convertedResourceDir: 'var/converted-resource/',
} as const;

// ============================================================================
// Schemas
// ============================================================================

const nonNegativeInt = z.number().int().nonnegative();

/**
 * Remote source of collection files: an S3 bucket or an HTTP(S) base URL
 */
export const RemoteLocationSchema = z
  .object({
    bucket: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    collectionName: z.string().min(1, 'collection name is required'),
  })
  .refine((value) => value.bucket !== undefined || value.baseUrl !== undefined, {
    message: 'Either bucket or base URL must be provided',
  });

export type RemoteLocationOptions = z.infer<typeof RemoteLocationSchema>;

/**
 * Dataset filter and offset/limit window
 */
export const ShardSchema = z.object({
  dataset: z.string().min(1).optional(),
  offset: nonNegativeInt.optional(),
  limit: nonNegativeInt.optional(),
});

export type ShardOptions = z.infer<typeof ShardSchema>;

/**
 * Directory layout, each entry defaulted from DEFAULT_DIRS
 */
export const TransformDirsSchema = z.object({
  pipelineDir: z.string().min(1).default(DEFAULT_DIRS.pipelineDir),
  specificationDir: z.string().min(1).default(DEFAULT_DIRS.specificationDir),
  cacheDir: z.string().min(1).default(DEFAULT_DIRS.cacheDir),
  transformedDir: z.string().min(1).default(DEFAULT_DIRS.transformedDir),
  issueDir: z.string().min(1).default(DEFAULT_DIRS.issueDir),
  operationalIssueDir: z.string().min(1).default(DEFAULT_DIRS.operationalIssueDir),
  outputLogDir: z.string().min(1).default(DEFAULT_DIRS.outputLogDir),
  columnFieldDir: z.string().min(1).default(DEFAULT_DIRS.columnFieldDir),
  datasetResourceDir: z.string().min(1).default(DEFAULT_DIRS.datasetResourceDir),
  convertedResourceDir: z.string().min(1).default(DEFAULT_DIRS.convertedResourceDir),
});

export type TransformDirs = z.infer<typeof TransformDirsSchema>;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse options with a schema, converting Zod failures into ConfigurationError
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.infer<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ConfigurationError(details, { cause: result.error });
  }
  return result.data;
}

/**
 * Join a directory setting and a relative path without doubling slashes
 *
 * Directory settings conventionally end in '/', but callers may omit it.
 */
export function joinDir(dir: string, ...parts: string[]): string {
  const base = dir.endsWith('/') ? dir : `${dir}/`;
  return `${base}${parts.join('/')}`;
}
