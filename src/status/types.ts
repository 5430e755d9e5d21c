export type ModelSource = "clusters" | "endpoints" | "data" | "direct_list"

export type ModelRecord = {
  readonly name: string
  readonly cluster: string
  readonly framework: string
  readonly chatUrl: string | null
  readonly source: ModelSource
}

export type JobRecord = Record<string, unknown>

export type CanonicalStatus =
  | "Live"
  | "Running"
  | "Loaded"
  | "Starting"
  | "Queued"
  | "Offline"
  | "Stopped"
  | "Failed"
  | "Unknown"

export type JobBucket = "active" | "starting" | "queued"

export type DisplayStatus = "Active" | "Starting" | "Queued" | "Stopped"

export type GuessedFields = {
  name: string | null
  status: string
}

/**
 * Comparison key and the upstream spelling side by side: classification reads `key`,
 * rendering reads `display`.
 */
export type JobStatus = {
  key: string
  display: string
}

export type ClassifiedJob = {
  name: string
  status: JobStatus
  bucket: JobBucket | null
  models: string[]
}

export type JobBuckets = {
  active: ReadonlySet<string>
  starting: ReadonlySet<string>
  queued: ReadonlySet<string>
}

export type JobClassification = JobBuckets & {
  jobs: ClassifiedJob[]
  processedJobCount: number
  skippedSections: Record<string, number>
}

export type ModelStatusEntry = {
  name: string
  status: DisplayStatus
  record: ModelRecord
}

export type ModelStatusView = {
  entries: ModelStatusEntry[]
  configuredCount: number
  totalActive: number
  counts: Record<JobBucket, number>
  uncataloguedActive: string[]
}

/**
 * Receives non-fatal observations from the pure core so callers can route them to a
 * logger without the core depending on one.
 */
export type Diagnostics = (message: string, details?: Record<string, unknown>) => void
