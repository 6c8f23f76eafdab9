/**
 * Collection Task Core Types
 *
 * Shared data model for the resource task pipeline: collection index,
 * redirects, tasks, fingerprints and run outcomes.
 *
 * TYPE SAFETY: All structures are immutable once produced by the loader.
 */

// ============================================================================
// Collection Model
// ============================================================================

/**
 * Content-addressed identifier of one uploaded file
 */
export type ResourceId = string;

/**
 * Dataset name a resource is published under
 */
export type DatasetName = string;

/**
 * Dataset → resources membership index
 *
 * Accepts either a Map of Sets (what the loader builds) or a plain record of
 * arrays (what tests and callers usually hand-write). Neither carries an
 * order the core relies on.
 */
export type CollectionIndex =
  | ReadonlyMap<DatasetName, ReadonlySet<ResourceId> | readonly ResourceId[]>
  | Readonly<Record<DatasetName, readonly ResourceId[]>>;

/**
 * Historical rename or retirement of a resource
 */
export interface RedirectEntry {
  /** Identifier the collection used to publish */
  readonly oldResource: ResourceId;

  /** Current identifier, or '' when the resource was removed */
  readonly resource: ResourceId;

  /** HTTP-style status: '301' moved, '410' retired */
  readonly status: string;
}

/**
 * Per-resource metadata passed through to the transform engine untouched
 */
export interface ResourceMetadata {
  readonly endpoints: readonly string[];
  readonly organisations: readonly string[];
  readonly startDate: string;
}

// ============================================================================
// Tasks
// ============================================================================

/**
 * One unit of work: a resource as requested under one dataset
 *
 * `resource` is always the pre-redirect identifier. Output naming uses it;
 * only the physical input lookup goes through redirects.
 */
export interface Task {
  readonly dataset: DatasetName;
  readonly resource: ResourceId;
}

/**
 * Canonically ordered task sequence (dataset, then resource)
 */
export type TaskList = readonly Task[];

/**
 * Stable identity used in logs and error reports
 */
export function taskId(task: Task): string {
  return `${task.dataset}/${task.resource}`;
}

// ============================================================================
// Fingerprints
// ============================================================================

/**
 * Dependency fingerprint recorded after a successful transform
 */
export interface Fingerprint {
  readonly configHash: string;
  readonly specificationHash: string;
  readonly codeVersion: string;
}

// ============================================================================
// Run Outcomes
// ============================================================================

/**
 * Failure recorded for one task
 */
export interface TaskFailure {
  readonly taskId: string;
  readonly dataset: DatasetName;
  readonly resource: ResourceId;
  readonly message: string;
}

/**
 * Outcome reported by a worker for one task
 */
export type TaskOutcome =
  | { readonly ok: true }
  | { readonly ok: false; readonly message: string };

/**
 * Result of a task run
 *
 * `noop` means there was nothing to run after filtering and no pool was
 * started. It is distinct from a `completed` run that happened to have
 * zero successes.
 */
export type TaskRunResult =
  | { readonly kind: 'noop' }
  | {
      readonly kind: 'completed';
      readonly successful: number;
      readonly failed: number;
      readonly errors: readonly TaskFailure[];
    };

/**
 * A run that started a pool
 */
export type CompletedRun = Extract<TaskRunResult, { readonly kind: 'completed' }>;
