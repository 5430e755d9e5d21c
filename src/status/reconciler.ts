import { dedupeModels } from "./catalog.js"
import type {
  DisplayStatus,
  JobBuckets,
  ModelRecord,
  ModelStatusEntry,
  ModelStatusView,
} from "./types.js"

const PRECEDENCE: ReadonlyArray<readonly [keyof JobBuckets, DisplayStatus]> = [
  ["active", "Active"],
  ["starting", "Starting"],
  ["queued", "Queued"],
]

/**
 * Code-point ordering, so the listing is stable regardless of the host locale.
 */
export const compareNames = (left: string, right: string): number => {
  if (left === right) {
    return 0
  }

  return left < right ? -1 : 1
}

export const resolveDisplayStatus = (name: string, buckets: JobBuckets): DisplayStatus => {
  for (const [bucket, status] of PRECEDENCE) {
    if (buckets[bucket].has(name)) {
      return status
    }
  }

  return "Stopped"
}

/**
 * Produces one status per configured model, sorted by name. Precedence is fixed at
 * Active, Starting, Queued, then Stopped for names no job mentions.
 *
 * `totalActive` sums the bucket sizes rather than taking their union, so a model reported
 * under two statuses by different jobs is counted twice.
 *
 * @param catalog Catalog records, possibly with repeated names.
 * @param buckets Bucket sets from job classification.
 * @returns Catalog-keyed view plus counts and active models missing from the catalog.
 */
export const reconcileStatuses = (
  catalog: readonly ModelRecord[],
  buckets: JobBuckets
): ModelStatusView => {
  const unique = dedupeModels(catalog)
  const catalogNames = new Set(unique.map((record) => record.name))

  const entries: ModelStatusEntry[] = [...unique]
    .sort((left, right) => compareNames(left.name, right.name))
    .map((record) => ({
      name: record.name,
      status: resolveDisplayStatus(record.name, buckets),
      record,
    }))

  const counts = {
    active: buckets.active.size,
    starting: buckets.starting.size,
    queued: buckets.queued.size,
  }

  return {
    entries,
    configuredCount: unique.length,
    totalActive: counts.active + counts.starting + counts.queued,
    counts,
    uncataloguedActive: [...buckets.active]
      .filter((name) => !catalogNames.has(name))
      .sort(compareNames),
  }
}

export const filterLive = (entries: readonly ModelStatusEntry[]): ModelStatusEntry[] => {
  return entries.filter((entry) => entry.status !== "Stopped")
}
