import type { Logger } from "pino"

import type { InferenceApiClient } from "../http/client.js"
import {
  CATALOG_CANDIDATE_PATHS,
  RESOURCE_SERVER_PATH,
  normalizeCatalog,
  summarizeClusterConfiguration,
  type ClusterConfigurationSummary,
} from "./catalog.js"
import { classifyJobs } from "./jobs.js"
import { reconcileStatuses } from "./reconciler.js"
import type { Diagnostics, JobClassification, ModelRecord, ModelStatusView } from "./types.js"

type StatusLogger = Pick<Logger, "debug" | "info" | "warn">

type CollectCatalogInput = {
  client: InferenceApiClient
  apiHost: string
  logger: StatusLogger
}

export type CollectedCatalog = {
  records: ModelRecord[]
  clusterConfiguration: ClusterConfigurationSummary[]
}

type RunStatusCheckInput = CollectCatalogInput & {
  jobsCluster: string
}

export type StatusCheckResult = {
  catalog: CollectedCatalog
  classification: JobClassification
  view: ModelStatusView
}

export const createLoggerDiagnostics = (logger: Pick<Logger, "debug">): Diagnostics => {
  return (message, details) => {
    logger.debug(details ?? {}, message)
  }
}

export const resolveJobsPath = (jobsCluster: string): string => {
  return `${RESOURCE_SERVER_PATH}/${jobsCluster}/jobs`
}

/**
 * Queries every catalog candidate once, in declared order. A failing or empty candidate is
 * logged and contributes nothing; the others still run.
 *
 * @returns All records in candidate order (not yet deduplicated) and the configuration
 * summary of the first clusters-shaped body.
 */
export const collectCatalog = async ({
  client,
  apiHost,
  logger,
}: CollectCatalogInput): Promise<CollectedCatalog> => {
  const diagnostics = createLoggerDiagnostics(logger)
  const records: ModelRecord[] = []
  let clusterConfiguration: ClusterConfigurationSummary[] | null = null

  for (const candidate of CATALOG_CANDIDATE_PATHS) {
    const endpoint = `${RESOURCE_SERVER_PATH}${candidate}`

    let body: unknown
    try {
      body = await client.getJson(endpoint, "Available models query")
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      logger.warn({ endpoint, error: message }, "Failed to fetch models from catalog candidate")
      continue
    }

    const models = normalizeCatalog(body, { apiHost, diagnostics })
    if (models.length === 0) {
      logger.warn({ endpoint }, "No models found in catalog candidate response")
      continue
    }

    logger.info({ endpoint, count: models.length }, "Models found in catalog candidate")
    records.push(...models)

    if (clusterConfiguration === null) {
      const summary = summarizeClusterConfiguration(body)
      clusterConfiguration = summary.length > 0 ? summary : null
    }
  }

  return {
    records,
    clusterConfiguration: clusterConfiguration ?? [],
  }
}

/**
 * Runs one status pass: best-effort catalog collection, then the required jobs fetch,
 * then reconciliation. Only a jobs fetch failure is fatal.
 *
 * @param input API client, host used for chat URLs, jobs cluster and logger.
 * @returns Collected catalog, job classification and the reconciled view.
 */
export const runStatusCheck = async (input: RunStatusCheckInput): Promise<StatusCheckResult> => {
  const { client, logger } = input

  logger.info("Fetching available models")
  const catalog = await collectCatalog(input)

  logger.info("Fetching current jobs status")
  const jobsBody = await client.getJson(resolveJobsPath(input.jobsCluster), "Jobs status query")
  const classification = classifyJobs(jobsBody, {
    diagnostics: createLoggerDiagnostics(logger),
  })

  for (const [section, count] of Object.entries(classification.skippedSections)) {
    logger.debug({ section, count }, "Jobs section not processed")
  }

  const view = reconcileStatuses(catalog.records, classification)
  logger.info(
    {
      configured: view.configuredCount,
      running: view.counts.active,
      starting: view.counts.starting,
      queued: view.counts.queued,
    },
    "Status reconciliation finished"
  )

  return { catalog, classification, view }
}
