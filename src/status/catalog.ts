import { guessFields } from "./field-guesser.js"
import { isRecord, readText } from "./records.js"
import type { Diagnostics, ModelRecord, ModelSource } from "./types.js"

export const DEFAULT_API_HOST = "https://inference-api.alcf.anl.gov"

export const RESOURCE_SERVER_PATH = "/resource_server"

export const CATALOG_CANDIDATE_PATHS = ["/list-endpoints", "/models", "/v1/models"] as const

const DEFAULT_PLACEMENT = "default"
const UNKNOWN_MODEL_NAME = "Unknown"

type NormalizeCatalogOptions = {
  apiHost?: string
  diagnostics?: Diagnostics
}

export type ClusterConfigurationSummary = {
  cluster: string
  frameworks: Array<{
    framework: string
    modelCount: number
    endpointKinds: string[]
  }>
}

const createDefaultRecord = (name: string, source: ModelSource): ModelRecord => {
  return {
    name,
    cluster: DEFAULT_PLACEMENT,
    framework: DEFAULT_PLACEMENT,
    chatUrl: null,
    source,
  }
}

const buildChatUrl = (apiHost: string, baseUrl: string, chatPath: string | null): string | null => {
  if (!chatPath) {
    return null
  }

  return `${apiHost}${baseUrl}${chatPath}`.replace(/\/+$/, "")
}

const fromClusters = (clusters: Record<string, unknown>, apiHost: string): ModelRecord[] => {
  const records: ModelRecord[] = []

  for (const [clusterName, clusterInfo] of Object.entries(clusters)) {
    if (!isRecord(clusterInfo) || !isRecord(clusterInfo.frameworks)) {
      continue
    }

    const baseUrl = typeof clusterInfo.base_url === "string" ? clusterInfo.base_url : ""

    for (const [frameworkName, frameworkInfo] of Object.entries(clusterInfo.frameworks)) {
      if (!isRecord(frameworkInfo) || !Array.isArray(frameworkInfo.models)) {
        continue
      }

      const endpoints: Record<string, unknown> = isRecord(frameworkInfo.endpoints)
        ? frameworkInfo.endpoints
        : {}
      const chatUrl = buildChatUrl(apiHost, baseUrl, readText(endpoints, "chat"))

      for (const model of frameworkInfo.models) {
        if (typeof model !== "string") {
          continue
        }

        records.push({
          name: model,
          cluster: clusterName,
          framework: frameworkName,
          chatUrl,
          source: "clusters",
        })
      }
    }
  }

  return records
}

const fromNamedList = (
  items: unknown[],
  nameKeys: readonly [string, string],
  source: ModelSource
): ModelRecord[] => {
  return items.filter(isRecord).map((item) => {
    const name = readText(item, nameKeys[0]) ?? readText(item, nameKeys[1]) ?? UNKNOWN_MODEL_NAME
    return createDefaultRecord(name, source)
  })
}

const fromDirectList = (items: unknown[], diagnostics?: Diagnostics): ModelRecord[] => {
  const records: ModelRecord[] = []

  for (const item of items) {
    if (!isRecord(item)) {
      continue
    }

    const { name } = guessFields(item, diagnostics)
    if (name) {
      records.push(createDefaultRecord(name, "direct_list"))
    }
  }

  return records
}

/**
 * Flattens one "list models" response into model records. The first recognised shape wins
 * (`clusters`, then `endpoints`, then `data`, then a bare list); shapes are never combined
 * within one body and an unrecognised body yields no records.
 *
 * @param body Parsed JSON body of one catalog candidate.
 * @param options API host used to build chat URLs and an optional diagnostics sink.
 * @returns Model records in body order.
 */
export const normalizeCatalog = (
  body: unknown,
  options: NormalizeCatalogOptions = {}
): ModelRecord[] => {
  const apiHost = options.apiHost ?? DEFAULT_API_HOST

  if (Array.isArray(body)) {
    options.diagnostics?.("Found direct list structure in response")
    return fromDirectList(body, options.diagnostics)
  }

  if (!isRecord(body)) {
    return []
  }

  if ("clusters" in body) {
    options.diagnostics?.("Found clusters structure in response")
    return isRecord(body.clusters) ? fromClusters(body.clusters, apiHost) : []
  }

  if (Array.isArray(body.endpoints)) {
    options.diagnostics?.("Found endpoints list structure in response")
    return fromNamedList(body.endpoints, ["model", "name"], "endpoints")
  }

  if (Array.isArray(body.data)) {
    options.diagnostics?.("Found data list structure in response")
    return fromNamedList(body.data, ["id", "name"], "data")
  }

  return []
}

/**
 * Collapses records sharing a name. The first record seen keeps its placement and chat URL.
 */
export const dedupeModels = (records: readonly ModelRecord[]): ModelRecord[] => {
  const unique = new Map<string, ModelRecord>()

  for (const record of records) {
    if (!unique.has(record.name)) {
      unique.set(record.name, record)
    }
  }

  return [...unique.values()]
}

/**
 * Describes a clusters-shaped catalog body as configuration only: which frameworks each
 * cluster exposes, how many models they list and which endpoint kinds they publish.
 *
 * @returns One entry per cluster that has frameworks, or an empty list for other shapes.
 */
export const summarizeClusterConfiguration = (body: unknown): ClusterConfigurationSummary[] => {
  if (!isRecord(body) || !isRecord(body.clusters)) {
    return []
  }

  const summaries: ClusterConfigurationSummary[] = []

  for (const [clusterName, clusterInfo] of Object.entries(body.clusters)) {
    if (!isRecord(clusterInfo) || !isRecord(clusterInfo.frameworks)) {
      continue
    }

    summaries.push({
      cluster: clusterName,
      frameworks: Object.entries(clusterInfo.frameworks)
        .filter((entry): entry is [string, Record<string, unknown>] => isRecord(entry[1]))
        .map(([frameworkName, frameworkInfo]) => ({
          framework: frameworkName,
          modelCount: Array.isArray(frameworkInfo.models) ? frameworkInfo.models.length : 0,
          endpointKinds: isRecord(frameworkInfo.endpoints)
            ? Object.keys(frameworkInfo.endpoints)
            : [],
        })),
    })
  }

  return summaries
}
