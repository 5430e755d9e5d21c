import { createColors } from "colorette"

import { resolveCanonicalStatus } from "../status/field-guesser.js"
import { dedupeModels, type ClusterConfigurationSummary } from "../status/catalog.js"
import type { StatusCheckResult } from "../status/check.js"
import { compareNames, filterLive } from "../status/reconciler.js"
import type {
  ClassifiedJob,
  DisplayStatus,
  ModelRecord,
  ModelSource,
  ModelStatusView,
} from "../status/types.js"

type Palette = ReturnType<typeof createColors>

export type RenderStatusReportInput = {
  result: StatusCheckResult
  verbose: boolean
  liveOnly: boolean
  useColor: boolean
  completedAt: Date
}

const STATUS_COLUMN_WIDTH = 10
const BULLET = "●"
const CHECK = "✓"

const heading = (palette: Palette, title: string): string => {
  return palette.bold(`=== ${title} ===`)
}

const colorJobStatus = (palette: Palette, display: string): string => {
  const padded = display.padEnd(STATUS_COLUMN_WIDTH)

  switch (resolveCanonicalStatus(display)) {
    case "Live":
    case "Running":
    case "Loaded":
      return palette.green(padded)
    case "Starting":
      return palette.yellow(padded)
    case "Queued":
      return palette.blue(padded)
    case "Offline":
    case "Stopped":
    case "Failed":
      return palette.red(padded)
    default:
      return palette.dim(padded)
  }
}

const renderModelLine = (palette: Palette, name: string, status: DisplayStatus): string => {
  switch (status) {
    case "Active":
      return palette.green(`  ${BULLET} ${name}`)
    case "Starting":
      return palette.yellow(`  ${BULLET} ${name} (Starting)`)
    case "Queued":
      return palette.blue(`  ${BULLET} ${name} (Queued)`)
    case "Stopped":
      return palette.red(`  ${BULLET} ${name} (Stopped)`)
  }
}

const renderAvailableModels = (palette: Palette, records: readonly ModelRecord[]): string[] => {
  const lines = ["", heading(palette, "AVAILABLE MODELS (Configured & Ready)")]

  if (records.length === 0) {
    lines.push(palette.dim("  No available models found"))
    return lines
  }

  const bySource = new Map<ModelSource, ModelRecord[]>()
  for (const record of records) {
    const group = bySource.get(record.source) ?? []
    group.push(record)
    bySource.set(record.source, group)
  }

  for (const [source, group] of bySource) {
    lines.push("", palette.cyan(`From ${source} endpoint:`))

    for (const record of [...group].sort((left, right) => compareNames(left.name, right.name))) {
      const placement =
        record.cluster === "default" ? "" : ` (${record.cluster}/${record.framework})`
      lines.push(`  ${palette.green(CHECK)} ${record.name}${placement}`)
    }
  }

  return lines
}

const renderJobs = (
  palette: Palette,
  jobs: readonly ClassifiedJob[],
  processedJobCount: number
): string[] => {
  const lines = ["", heading(palette, "ACTIVE (Live/Running/Starting/Loaded) FROM /jobs")]

  for (const job of jobs) {
    if (job.bucket === null) {
      continue
    }

    lines.push(`${colorJobStatus(palette, job.status.display)}  ${job.name}`)
  }

  if (processedJobCount === 0) {
    lines.push(palette.dim("  No active jobs found"))
  }

  return lines
}

const renderConfiguration = (
  palette: Palette,
  clusters: readonly ClusterConfigurationSummary[]
): string[] => {
  const lines = ["", heading(palette, "ENDPOINT CONFIGURATION INFO")]

  if (clusters.length === 0) {
    lines.push(palette.dim("  No cluster configuration found"))
    return lines
  }

  for (const cluster of clusters) {
    lines.push("", palette.cyan(`Cluster: ${cluster.cluster}`))
    for (const framework of cluster.frameworks) {
      lines.push(
        `  ${framework.framework}: ${framework.modelCount} models, endpoints: ${framework.endpointKinds.join(", ")}`
      )
    }
  }

  return lines
}

const renderBreakdown = (palette: Palette, view: ModelStatusView): string[] => {
  const parts: string[] = []
  if (view.counts.active > 0) {
    parts.push(palette.green(`${view.counts.active} running`))
  }
  if (view.counts.starting > 0) {
    parts.push(palette.yellow(`${view.counts.starting} starting`))
  }
  if (view.counts.queued > 0) {
    parts.push(palette.blue(`${view.counts.queued} queued`))
  }

  if (parts.length === 0) {
    return []
  }

  if (parts.length === 1) {
    return ["", `  ${parts[0]} / ${view.configuredCount} total configured`]
  }

  return [
    "",
    `  ${parts.join(" + ")} = ${view.totalActive} models active / ${view.configuredCount} total configured`,
  ]
}

const renderTechnicalNote = (palette: Palette, view: ModelStatusView): string[] => {
  return [
    "",
    `${palette.yellow("i")} ${palette.bold("Technical Note:")}`,
    `  - /jobs API shows live models (${view.counts.active} running, ${view.counts.starting} starting, ${view.counts.queued} queued)`,
    "  - /list-endpoints API shows configured endpoints (not live status)",
    "  - Live status comes from actual job execution, not endpoint configuration",
  ]
}

const pad = (value: number): string => {
  return String(value).padStart(2, "0")
}

export const formatCompletedAt = (date: Date): string => {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time}`
}

/**
 * Renders a status pass as terminal lines. The summary and model listing are always
 * present; verbose mode prepends the catalog, job and configuration sections and appends a
 * technical note.
 *
 * @param input Status check result, display switches and the completion time to print.
 * @returns Report lines without trailing newlines.
 */
export const renderStatusReport = ({
  result,
  verbose,
  liveOnly,
  useColor,
  completedAt,
}: RenderStatusReportInput): string[] => {
  const palette = createColors({ useColor })
  const { view, classification, catalog } = result
  const lines: string[] = []

  if (verbose) {
    lines.push(...renderAvailableModels(palette, dedupeModels(catalog.records)))
    lines.push(...renderJobs(palette, classification.jobs, classification.processedJobCount))
    lines.push(...renderConfiguration(palette, catalog.clusterConfiguration))
  }

  lines.push(
    "",
    heading(palette, "SUMMARY"),
    `Available models (configured): ${palette.green(String(view.configuredCount))}`,
    `Active models: ${palette.green(String(view.totalActive))}`
  )

  if (view.entries.length > 0) {
    const entries = liveOnly ? filterLive(view.entries) : view.entries
    lines.push("", palette.bold(liveOnly ? "Live Models:" : "All Models:"))
    lines.push(...entries.map((entry) => renderModelLine(palette, entry.name, entry.status)))
    lines.push(...renderBreakdown(palette, view))
  }

  if (view.uncataloguedActive.length > 0) {
    lines.push("", palette.bold("Active but not in catalog:"))
    lines.push(...view.uncataloguedActive.map((name) => renderModelLine(palette, name, "Active")))
  }

  if (verbose) {
    lines.push(...renderTechnicalNote(palette, view))
  }

  lines.push("", palette.dim(`Analysis completed at ${formatCompletedAt(completedAt)}`))
  return lines
}
