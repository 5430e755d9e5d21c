import type { Logger } from "pino"

export class InferenceApiError extends Error {
  statusCode: number | null
  endpoint: string

  constructor(message: string, endpoint: string, statusCode: number | null = null) {
    super(message)
    this.name = "InferenceApiError"
    this.endpoint = endpoint
    this.statusCode = statusCode
  }
}

export type FetchLike = typeof fetch

export type InferenceApiClient = {
  getJson: (endpoint: string, description: string) => Promise<unknown>
}

type InferenceApiClientInput = {
  apiHost: string
  token: string
  timeoutMs: number
  logger: Pick<Logger, "debug" | "info" | "warn">
  fetchImpl?: FetchLike
  now?: () => number
}

const formatSeconds = (milliseconds: number): string => {
  return `${(milliseconds / 1000).toFixed(2)}s`
}

const isTimeoutError = (error: unknown): boolean => {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")
}

const toTransportError = (
  error: unknown,
  description: string,
  endpoint: string,
  elapsedMs: number
): InferenceApiError => {
  const elapsed = formatSeconds(elapsedMs)
  if (isTimeoutError(error)) {
    return new InferenceApiError(`${description} timed out after ${elapsed}`, endpoint)
  }

  const message = error instanceof Error ? error.message : String(error)
  return new InferenceApiError(`${description} failed after ${elapsed}: ${message}`, endpoint)
}

const describeBody = (body: unknown): Record<string, unknown> => {
  if (Array.isArray(body)) {
    return { itemCount: body.length }
  }

  if (typeof body === "object" && body !== null) {
    const items = "items" in body ? body.items : undefined
    return Array.isArray(items) ? { itemCount: items.length } : { keys: Object.keys(body) }
  }

  return {}
}

/**
 * Creates the bearer-authenticated client for the inference management API. Each call is
 * made exactly once with its own timeout; any transport failure, non-2xx status or
 * non-JSON body becomes an {@link InferenceApiError}.
 *
 * @param input API host, token, timeout and optional fetch override.
 * @returns Client exposing a single JSON read operation.
 */
export const createInferenceApiClient = ({
  apiHost,
  token,
  timeoutMs,
  logger,
  fetchImpl = fetch,
  now = Date.now,
}: InferenceApiClientInput): InferenceApiClient => {
  return {
    getJson: async (endpoint: string, description: string): Promise<unknown> => {
      const url = `${apiHost}${endpoint}`
      const startedAt = now()
      logger.debug({ url }, `${description} started`)

      let response: Response
      try {
        response = await fetchImpl(url, {
          method: "GET",
          headers: {
            authorization: `Bearer ${token}`,
          },
          signal: AbortSignal.timeout(timeoutMs),
        })
      } catch (error) {
        throw toTransportError(error, description, endpoint, now() - startedAt)
      }

      const elapsed = formatSeconds(now() - startedAt)
      if (!response.ok) {
        logger.warn({ url, statusCode: response.status }, `${description} returned an error`)
        throw new InferenceApiError(
          `${description} failed for ${endpoint} (${response.status})`,
          endpoint,
          response.status
        )
      }

      let text: string
      try {
        text = await response.text()
      } catch (error) {
        throw toTransportError(error, description, endpoint, now() - startedAt)
      }

      let body: unknown
      try {
        body = JSON.parse(text)
      } catch {
        throw new InferenceApiError(
          `${description} returned invalid JSON for ${endpoint}`,
          endpoint,
          response.status
        )
      }

      logger.info({ url, elapsed, ...describeBody(body) }, `${description} completed`)
      return body
    },
  }
}
