/**
 * Redirect Resolver
 *
 * Maps historical resource identifiers to their current identifier. Built once
 * from the collection's old-resource entries and read-only afterwards.
 */

import type { RedirectEntry, ResourceId } from '../core/types.js';

/**
 * Sentinel for a resource redirected to nothing
 */
export const REMOVED: unique symbol = Symbol('removed');
export type Removed = typeof REMOVED;

/**
 * Status the source uses for permanently withdrawn resources
 */
export const RETIRED_STATUS = '410';

export class RedirectResolver {
  private readonly redirects: ReadonlyMap<ResourceId, ResourceId>;
  private readonly retired: ReadonlySet<ResourceId>;

  private constructor(redirects: Map<ResourceId, ResourceId>, retired: Set<ResourceId>) {
    this.redirects = redirects;
    this.retired = retired;
  }

  /**
   * Build from redirect entries; a later entry for the same resource wins
   */
  static fromEntries(entries: readonly RedirectEntry[]): RedirectResolver {
    const redirects = new Map<ResourceId, ResourceId>();
    const retired = new Set<ResourceId>();

    for (const entry of entries) {
      redirects.set(entry.oldResource, entry.resource);
      if (entry.status === RETIRED_STATUS) {
        retired.add(entry.oldResource);
      } else {
        retired.delete(entry.oldResource);
      }
    }

    return new RedirectResolver(redirects, retired);
  }

  static empty(): RedirectResolver {
    return new RedirectResolver(new Map(), new Set());
  }

  /**
   * Current identifier for `requested`, itself when never redirected
   */
  resolve(requested: ResourceId): ResourceId | Removed {
    const target = this.redirects.get(requested);
    if (target === undefined) return requested;
    return target === '' ? REMOVED : target;
  }

  /**
   * Resources the source has permanently withdrawn (status 410)
   */
  retiredSet(): ReadonlySet<ResourceId> {
    return this.retired;
  }

  isRetired(resource: ResourceId): boolean {
    return this.retired.has(resource);
  }

  get size(): number {
    return this.redirects.size;
  }
}
