import { readText } from "./records.js"
import type { CanonicalStatus, Diagnostics, GuessedFields, JobRecord, JobStatus } from "./types.js"

/**
 * One extraction step. Rules are pure and return null when they have nothing to offer, so
 * a rule list reads as "first non-null wins".
 */
export type FieldRule = (record: JobRecord) => string | null

const NAME_KEYS = ["model", "name", "endpoint", "id"] as const
const STATUS_KEYS = ["status", "state", "endpoint_status", "lifecycle"] as const
const JOB_STATUS_KEYS = ["Model Status", "Job State"] as const

const ESTIMATED_START_KEY = "Estimated Start Time"
const FORCED_STARTING_STATUS = "Starting"

const CANONICAL_STATUSES: readonly CanonicalStatus[] = [
  "Live",
  "Running",
  "Loaded",
  "Starting",
  "Queued",
  "Offline",
  "Stopped",
  "Failed",
  "Unknown",
]

export const keyRule = (key: string): FieldRule => {
  return (record) => readText(record, key)
}

export const firstMatch = (rules: readonly FieldRule[]): FieldRule => {
  return (record) => {
    for (const rule of rules) {
      const value = rule(record)
      if (value !== null) {
        return value
      }
    }

    return null
  }
}

/**
 * Usable entries of a job's `Models` list: non-blank strings only. Anything other than a
 * list yields an empty result.
 */
export const readModelList = (record: JobRecord): string[] => {
  const models = record.Models
  if (!Array.isArray(models)) {
    return []
  }

  return models.filter(
    (model): model is string => typeof model === "string" && model.trim().length > 0
  )
}

const jobModelsNameRule: FieldRule = (record) => {
  const models = readModelList(record)

  if (models.length > 0) {
    const [first] = models
    return models.length === 1 ? first : `${first} (+${models.length - 1} others)`
  }

  if (typeof record.Models === "string") {
    return readText(record, "Models")
  }

  const framework = readText(record, "Framework")
  const cluster = readText(record, "Cluster")
  return framework && cluster ? `${framework} on ${cluster}` : null
}

const directNameRule = firstMatch(NAME_KEYS.map(keyRule))
const directStatusRule = firstMatch(STATUS_KEYS.map(keyRule))
const jobStatusRule = firstMatch(JOB_STATUS_KEYS.map(keyRule))

const isJobShape = (record: JobRecord): boolean => {
  return "Models" in record
}

/**
 * True when one of the direct name keys resolves, in which case the job shape is never
 * consulted for the name.
 */
export const hasDirectName = (record: JobRecord): boolean => {
  return directNameRule(record) !== null
}

/**
 * Pulls a display name and a raw status out of a record whose schema is not known up front.
 * Direct keys win; the job shape (`Models`, `Framework`, `Cluster`) is only consulted when
 * no direct name exists. A job carrying an estimated start time is reported as starting
 * whatever its own state says.
 *
 * @param record Arbitrary upstream record.
 * @param diagnostics Optional sink for records whose name cannot be resolved.
 * @returns Name (or null) and trimmed status (empty when absent).
 */
export const guessFields = (record: JobRecord, diagnostics?: Diagnostics): GuessedFields => {
  let name = directNameRule(record)
  let status = directStatusRule(record)

  if (name === null && isJobShape(record)) {
    name = jobModelsNameRule(record)

    if (status === null) {
      status = jobStatusRule(record)

      if (ESTIMATED_START_KEY in record) {
        status = FORCED_STARTING_STATUS
      }
    }
  }

  if (name === null) {
    diagnostics?.("Could not determine name for record", {
      keys: Object.keys(record).slice(0, 3),
    })
  }

  return {
    name,
    status: (status ?? "").trim(),
  }
}

export const toJobStatus = (status: string): JobStatus => {
  return {
    key: status.toLowerCase(),
    display: status,
  }
}

/**
 * Maps free-form upstream status text onto the canonical vocabulary, ignoring case.
 */
export const resolveCanonicalStatus = (status: string): CanonicalStatus => {
  const key = status.trim().toLowerCase()
  return CANONICAL_STATUSES.find((candidate) => candidate.toLowerCase() === key) ?? "Unknown"
}
