import { guessFields, hasDirectName, readModelList, toJobStatus } from "./field-guesser.js"
import { isRecord } from "./records.js"
import type {
  ClassifiedJob,
  Diagnostics,
  JobBucket,
  JobClassification,
  JobRecord,
  JobStatus,
} from "./types.js"

export const PROCESSED_JOB_SECTIONS = [
  "running",
  "queued",
  "others",
  "private-batch-running",
] as const

export const EXCLUDED_JOB_SECTIONS = ["private-batch-queued"] as const

const FALLBACK_ITEMS_KEY = "items"
const UNKNOWN_JOB_NAME = "Unknown Job"

const ACTIVE_STATUS_KEYS: ReadonlySet<string> = new Set(["live", "running", "loaded"])

type ClassifyJobsOptions = {
  diagnostics?: Diagnostics
}

type CollectedJobs = {
  records: JobRecord[]
  processedJobCount: number
  skippedSections: Record<string, number>
}

const collectJobRecords = (body: unknown, diagnostics?: Diagnostics): CollectedJobs => {
  if (Array.isArray(body)) {
    return {
      records: body.filter(isRecord),
      processedJobCount: body.length,
      skippedSections: {},
    }
  }

  if (!isRecord(body)) {
    return { records: [], processedJobCount: 0, skippedSections: {} }
  }

  const records: JobRecord[] = []
  let processedJobCount = 0

  for (const section of PROCESSED_JOB_SECTIONS) {
    const entries = body[section]
    if (!Array.isArray(entries)) {
      continue
    }

    diagnostics?.(`Processing ${entries.length} jobs from '${section}' section`, { section })
    processedJobCount += entries.length
    records.push(...entries.filter(isRecord))
  }

  const skippedSections: Record<string, number> = {}
  for (const section of EXCLUDED_JOB_SECTIONS) {
    const entries = body[section]
    if (Array.isArray(entries) && entries.length > 0) {
      skippedSections[section] = entries.length
    }
  }

  const items = body[FALLBACK_ITEMS_KEY]
  if (records.length === 0 && Array.isArray(items)) {
    return {
      records: items.filter(isRecord),
      processedJobCount: items.length,
      skippedSections,
    }
  }

  return { records, processedJobCount, skippedSections }
}

export const resolveBucket = (status: JobStatus): JobBucket | null => {
  if (ACTIVE_STATUS_KEYS.has(status.key)) {
    return "active"
  }

  if (status.key === "starting") {
    return "starting"
  }

  if (status.key === "queued") {
    return "queued"
  }

  return null
}

const splitModelNames = (value: string): string[] => {
  if (!value.includes(",")) {
    return value.trim().length > 0 ? [value] : []
  }

  return value
    .split(",")
    .map((piece) => piece.trim())
    .filter((piece) => piece.length > 0)
}

/**
 * Resolves the model names one job serves. When the name came from the `Models` list, the
 * list is re-read because the guessed name only summarises it. A direct name key always
 * wins.
 */
const resolveJobModels = (record: JobRecord, guessedName: string): string[] => {
  const listed = hasDirectName(record) ? [] : readModelList(record)
  const sources = listed.length > 0 ? listed : [guessedName]

  return sources.flatMap(splitModelNames)
}

/**
 * Buckets the models named by a jobs response into active, starting and queued sets.
 * Sections are read in a fixed order and `private-batch-queued` is never counted. Every
 * model of a job lands in the bucket chosen by that job's status; the same name may end up
 * in several buckets when different jobs disagree.
 *
 * @param body Parsed jobs response: named sections, an `items` list, or a bare list.
 * @param options Optional diagnostics sink for skipped records and section progress.
 * @returns Bucket sets plus the per-job classification used for narration.
 */
export const classifyJobs = (
  body: unknown,
  options: ClassifyJobsOptions = {}
): JobClassification => {
  const { records, processedJobCount, skippedSections } = collectJobRecords(
    body,
    options.diagnostics
  )

  const buckets: Record<JobBucket, Set<string>> = {
    active: new Set(),
    starting: new Set(),
    queued: new Set(),
  }
  const jobs: ClassifiedJob[] = []

  for (const record of records) {
    const guessed = guessFields(record, options.diagnostics)
    if (guessed.name === null || guessed.name === UNKNOWN_JOB_NAME) {
      continue
    }

    const status = toJobStatus(guessed.status)
    const bucket = resolveBucket(status)
    const models = resolveJobModels(record, guessed.name)

    options.diagnostics?.("Parsed job record", {
      keys: Object.keys(record),
      name: guessed.name,
      status: status.display,
    })

    jobs.push({ name: guessed.name, status, bucket, models })

    if (bucket === null) {
      continue
    }

    for (const model of models) {
      buckets[bucket].add(model)
    }
  }

  return {
    active: buckets.active,
    starting: buckets.starting,
    queued: buckets.queued,
    jobs,
    processedJobCount,
    skippedSections,
  }
}
