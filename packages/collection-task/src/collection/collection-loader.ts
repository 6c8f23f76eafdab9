/**
 * Collection Loader
 *
 * Reads a collection directory into an immutable snapshot:
 *
 *   <dir>/resource.csv      resource, datasets, endpoints, organisations, start-date
 *   <dir>/old-resource.csv  old-resource, status, resource
 *   <dir>/resource/<id>     raw resource files (not read here)
 *
 * Multi-valued columns are ';'-separated. Loading is an explicit step; the
 * snapshot is never reloaded or mutated afterwards.
 */

import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import { CollectionLoadError, errorMessage, isNotFoundError } from '../core/errors.js';
import { joinDir } from '../core/config.js';
import type {
  DatasetName,
  RedirectEntry,
  ResourceId,
  ResourceMetadata,
} from '../core/types.js';

type CsvRow = Record<string, string | undefined>;

const EMPTY_METADATA: ResourceMetadata = { endpoints: [], organisations: [], startDate: '' };

function splitMulti(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(';')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

async function readCsv(path: string): Promise<CsvRow[] | null> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw new CollectionLoadError(path, errorMessage(error), { cause: error });
  }

  const parsed = Papa.parse<CsvRow>(text, { header: true, skipEmptyLines: true });
  const fatal = parsed.errors.find((error) => error.type === 'Quotes');
  if (fatal) {
    throw new CollectionLoadError(path, `row ${fatal.row ?? '?'}: ${fatal.message}`);
  }
  return parsed.data;
}

// ============================================================================
// Collection
// ============================================================================

export class Collection {
  readonly directory: string;
  private readonly datasets: ReadonlyMap<DatasetName, ReadonlySet<ResourceId>>;
  private readonly metadata: ReadonlyMap<ResourceId, ResourceMetadata>;
  private readonly redirects: readonly RedirectEntry[];

  constructor(
    directory: string,
    datasets: ReadonlyMap<DatasetName, ReadonlySet<ResourceId>>,
    metadata: ReadonlyMap<ResourceId, ResourceMetadata>,
    redirects: readonly RedirectEntry[]
  ) {
    this.directory = directory;
    this.datasets = datasets;
    this.metadata = metadata;
    this.redirects = redirects;
  }

  /**
   * Dataset → resources index
   */
  datasetResourceMap(): ReadonlyMap<DatasetName, ReadonlySet<ResourceId>> {
    return this.datasets;
  }

  /**
   * Redirect entries in file order
   */
  oldResourceEntries(): readonly RedirectEntry[] {
    return this.redirects;
  }

  /**
   * Local path of a raw resource file
   */
  resourcePath(resource: ResourceId): string {
    return joinDir(this.directory, 'resource', resource);
  }

  resourceMetadata(resource: ResourceId): ResourceMetadata {
    return this.metadata.get(resource) ?? EMPTY_METADATA;
  }

  resourceEndpoints(resource: ResourceId): readonly string[] {
    return this.resourceMetadata(resource).endpoints;
  }

  resourceOrganisations(resource: ResourceId): readonly string[] {
    return this.resourceMetadata(resource).organisations;
  }

  resourceStartDate(resource: ResourceId): string {
    return this.resourceMetadata(resource).startDate;
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load a collection directory
 *
 * @throws CollectionLoadError when resource.csv is missing or unreadable
 */
export async function loadCollection(collectionDir: string): Promise<Collection> {
  const resourceCsv = joinDir(collectionDir, 'resource.csv');
  const resourceRows = await readCsv(resourceCsv);
  if (resourceRows === null) {
    throw new CollectionLoadError(resourceCsv, 'resource.csv not found');
  }

  const datasets = new Map<DatasetName, Set<ResourceId>>();
  const metadata = new Map<ResourceId, ResourceMetadata>();

  for (const row of resourceRows) {
    const resource = row['resource']?.trim();
    if (!resource) continue;

    for (const dataset of splitMulti(row['datasets'])) {
      let members = datasets.get(dataset);
      if (!members) {
        members = new Set();
        datasets.set(dataset, members);
      }
      members.add(resource);
    }

    metadata.set(resource, {
      endpoints: splitMulti(row['endpoints']),
      organisations: splitMulti(row['organisations']),
      startDate: row['start-date']?.trim() ?? '',
    });
  }

  const oldResourceRows = (await readCsv(joinDir(collectionDir, 'old-resource.csv'))) ?? [];
  const redirects: RedirectEntry[] = [];
  for (const row of oldResourceRows) {
    const oldResource = row['old-resource']?.trim();
    if (!oldResource) continue;
    redirects.push({
      oldResource,
      resource: row['resource']?.trim() ?? '',
      status: row['status']?.trim() ?? '',
    });
  }

  return new Collection(collectionDir, datasets, metadata, redirects);
}
