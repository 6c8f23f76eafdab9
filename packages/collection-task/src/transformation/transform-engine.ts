/**
 * Transform Engine
 *
 * The transform itself (column mapping, issue detection, conversion) is an
 * external collaborator. This module defines the narrow interface the
 * workflows call, and the default implementation that drives the
 * `digital-land` command line tool as a child process, one per task.
 */

import { spawn } from 'node:child_process';
import { TransformError } from '../core/errors.js';
import type { DatasetName, ResourceId } from '../core/types.js';

// ============================================================================
// Interface
// ============================================================================

/**
 * Everything one transform invocation needs
 *
 * Output paths are named after the requested resource; `inputPath` points at
 * the redirected physical file. `resource` is set only when the two differ.
 */
export interface TransformRequest {
  readonly dataset: DatasetName;
  readonly inputPath: string;
  readonly outputPath: string;
  readonly resource?: ResourceId;

  readonly pipelineDir: string;
  readonly specificationDir: string;
  readonly collectionDir: string;
  readonly cacheDir: string;
  readonly issueDir: string;
  readonly operationalIssueDir: string;
  readonly outputLogDir: string;
  readonly columnFieldDir: string;
  readonly datasetResourceDir: string;
  readonly convertedResourceDir: string;
  readonly configPath: string;
  readonly organisationPath: string;

  readonly endpoints: readonly string[];
  readonly organisations: readonly string[];
  readonly entryDate: string;
}

export interface TransformEngine {
  /**
   * Transform one resource; rejects with TransformError on failure
   */
  run(request: TransformRequest): Promise<void>;

  /**
   * Version string recorded in the fingerprint
   */
  version(): Promise<string>;
}

// ============================================================================
// digital-land implementation
// ============================================================================

export interface DigitalLandTransformConfig {
  /** Executable to run (default "digital-land") */
  readonly command?: string;

  /** Version to record instead of asking the executable */
  readonly codeVersion?: string;
}

/** Characters of stdout and stderr kept from each child process */
export const MAX_CAPTURED_OUTPUT = 64 * 1024;

/**
 * Append a chunk, keeping only the last `limit` characters
 */
export function appendTail(current: string, chunk: string, limit = MAX_CAPTURED_OUTPUT): string {
  const combined = current + chunk;
  return combined.length > limit ? combined.slice(combined.length - limit) : combined;
}

/**
 * Last non-empty line of captured output, or '' when there is none
 */
export function lastLine(output: string): string {
  const lines = output.split(/\r?\n/).map((line) => line.trim()).filter((line) => line.length > 0);
  return lines[lines.length - 1] ?? '';
}

interface ProcessResult {
  readonly code: number | null;
  readonly stdout: string;
  readonly stderr: string;
}

function runProcess(command: string, args: readonly string[]): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (chunk: string) => {
      stdout = appendTail(stdout, chunk);
    });

    child.stderr.on('data', (chunk: string) => {
      stderr = appendTail(stderr, chunk);
    });

    child.on('close', (code: number | null) => {
      resolve({ code, stdout, stderr });
    });

    child.on('error', (error: Error) => {
      reject(new TransformError(`Failed to spawn ${command}: ${error.message}`, null));
    });
  });
}

/**
 * Command line for one `digital-land pipeline` invocation
 */
export function buildPipelineArgs(request: TransformRequest): string[] {
  const args = [
    '--dataset', request.dataset,
    '--pipeline-dir', request.pipelineDir,
    '--specification-dir', request.specificationDir,
    'pipeline',
    '--issue-dir', request.issueDir,
    '--operational-issue-dir', request.operationalIssueDir,
    '--column-field-dir', request.columnFieldDir,
    '--dataset-resource-dir', request.datasetResourceDir,
    '--converted-resource-dir', request.convertedResourceDir,
    '--output-log-dir', request.outputLogDir,
    '--cache-dir', request.cacheDir,
    '--collection-dir', request.collectionDir,
    '--config-path', request.configPath,
    '--organisation-path', request.organisationPath,
    '--endpoints', request.endpoints.join(' '),
    '--organisations', request.organisations.join(' '),
    '--entry-date', request.entryDate,
  ];

  if (request.resource !== undefined) {
    args.push('--resource', request.resource);
  }

  args.push(request.inputPath, request.outputPath);
  return args;
}

export class DigitalLandTransform implements TransformEngine {
  private readonly command: string;
  private readonly configuredVersion?: string;
  private cachedVersion?: Promise<string>;

  constructor(config: DigitalLandTransformConfig = {}) {
    this.command = config.command ?? 'digital-land';
    this.configuredVersion = config.codeVersion;
  }

  async run(request: TransformRequest): Promise<void> {
    const result = await runProcess(this.command, buildPipelineArgs(request));
    if (result.code !== 0) {
      const detail = lastLine(result.stderr);
      const message = `${this.command} pipeline exited with code ${result.code}`;
      throw new TransformError(detail ? `${message}: ${detail}` : message, result.code, result.stderr);
    }
  }

  version(): Promise<string> {
    if (this.configuredVersion !== undefined) {
      return Promise.resolve(this.configuredVersion);
    }
    this.cachedVersion ??= this.queryVersion();
    return this.cachedVersion;
  }

  private async queryVersion(): Promise<string> {
    const result = await runProcess(this.command, ['--version']);
    if (result.code !== 0) {
      throw new TransformError(`${this.command} --version exited with code ${result.code}`, result.code, result.stderr);
    }
    // "digital-land, version 0.1.2" → "0.1.2"
    const tokens = result.stdout.trim().split(/\s+/);
    return tokens[tokens.length - 1] ?? '';
  }
}
