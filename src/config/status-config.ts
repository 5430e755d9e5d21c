import { z } from "zod"

import { DEFAULT_API_HOST } from "../status/catalog.js"

const DEFAULT_JOBS_CLUSTER = "sophia"
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000

const optionalSetting = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional()

const statusEnvironmentSchema = z.object({
  INFERENCE_API_HOST: optionalSetting.pipe(
    z.string().url("INFERENCE_API_HOST must be an absolute URL").optional()
  ),
  INFERENCE_JOBS_CLUSTER: optionalSetting.pipe(
    z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, "INFERENCE_JOBS_CLUSTER must be a single path segment")
      .optional()
  ),
  INFERENCE_REQUEST_TIMEOUT_MS: optionalSetting.pipe(
    z.coerce
      .number()
      .int("INFERENCE_REQUEST_TIMEOUT_MS must be an integer")
      .min(1, "INFERENCE_REQUEST_TIMEOUT_MS must be >= 1")
      .optional()
  ),
  INFERENCE_TOKEN_FILE: optionalSetting,
})

export type StatusConfig = {
  apiHost: string
  jobsCluster: string
  requestTimeoutMs: number
  tokenFile: string | null
}

/**
 * Reads status check settings from the environment with one schema, so a bad value fails
 * before any request is made and names the offending variable.
 *
 * @param environment Process environment or a test double.
 * @returns Validated settings with defaults applied.
 */
export const resolveStatusConfig = (environment: NodeJS.ProcessEnv = process.env): StatusConfig => {
  const validated = statusEnvironmentSchema.safeParse(environment)

  if (!validated.success) {
    const detail = validated.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ")

    throw new Error(`Invalid status check configuration: ${detail}`)
  }

  const settings = validated.data

  return {
    apiHost: (settings.INFERENCE_API_HOST ?? DEFAULT_API_HOST).replace(/\/+$/, ""),
    jobsCluster: settings.INFERENCE_JOBS_CLUSTER ?? DEFAULT_JOBS_CLUSTER,
    requestTimeoutMs: settings.INFERENCE_REQUEST_TIMEOUT_MS ?? DEFAULT_REQUEST_TIMEOUT_MS,
    tokenFile: settings.INFERENCE_TOKEN_FILE ?? null,
  }
}
