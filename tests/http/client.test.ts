import { describe, expect, it, vi } from "vitest"

import { createInferenceApiClient, InferenceApiError } from "../../src/http/client.js"

const createLoggerStub = () => {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
  }
}

const createClock = (...values: number[]) => {
  let index = 0
  return () => values[Math.min(index++, values.length - 1)] ?? 0
}

describe("createInferenceApiClient", () => {
  it("sends the bearer token and returns the parsed body", async () => {
    // Arrange
    const logger = createLoggerStub()
    const seen: Array<{ url: string; authorization: string | null; method: string }> = []
    const fetchImpl: typeof fetch = async (input, init) => {
      seen.push({
        url: String(input),
        authorization: new Headers(init?.headers).get("authorization"),
        method: init?.method ?? "GET",
      })
      return Response.json({ items: [1, 2] }, { status: 200 })
    }
    const client = createInferenceApiClient({
      apiHost: "https://api.test",
      token: "test-token",
      timeoutMs: 1_000,
      logger,
      fetchImpl,
      now: createClock(1_000, 2_500),
    })

    // Act
    const body = await client.getJson("/resource_server/models", "Available models query")

    // Assert
    expect(body).toEqual({ items: [1, 2] })
    expect(seen).toEqual([
      {
        url: "https://api.test/resource_server/models",
        authorization: "Bearer test-token",
        method: "GET",
      },
    ])
    expect(logger.info).toHaveBeenCalledWith(
      { url: "https://api.test/resource_server/models", elapsed: "1.50s", itemCount: 2 },
      "Available models query completed"
    )
  })

  it("rejects non-2xx responses with the status code", async () => {
    // Arrange
    const client = createInferenceApiClient({
      apiHost: "https://api.test",
      token: "test-token",
      timeoutMs: 1_000,
      logger: createLoggerStub(),
      fetchImpl: async () => new Response("denied", { status: 403 }),
    })

    // Act
    const error = await client.getJson("/jobs", "Jobs status query").catch((caught) => caught)

    // Assert
    expect(error).toBeInstanceOf(InferenceApiError)
    expect(error).toMatchObject({
      message: "Jobs status query failed for /jobs (403)",
      statusCode: 403,
      endpoint: "/jobs",
    })
  })

  it("rejects malformed JSON bodies", async () => {
    const client = createInferenceApiClient({
      apiHost: "https://api.test",
      token: "test-token",
      timeoutMs: 1_000,
      logger: createLoggerStub(),
      fetchImpl: async () => new Response("<html>", { status: 200 }),
    })

    await expect(client.getJson("/jobs", "Jobs status query")).rejects.toThrow(
      "Jobs status query returned invalid JSON for /jobs"
    )
  })

  it("reports timeouts with the elapsed time", async () => {
    // Arrange
    const timeoutError = new Error("The operation was aborted due to timeout")
    timeoutError.name = "TimeoutError"
    const client = createInferenceApiClient({
      apiHost: "https://api.test",
      token: "test-token",
      timeoutMs: 30_000,
      logger: createLoggerStub(),
      fetchImpl: async () => {
        throw timeoutError
      },
      now: createClock(0, 30_000),
    })

    // Act / Assert
    await expect(client.getJson("/jobs", "Jobs status query")).rejects.toThrow(
      "Jobs status query timed out after 30.00s"
    )
  })

  it("maps a timeout while reading the body to an InferenceApiError", async () => {
    // Arrange
    const timeoutError = new Error("The operation was aborted due to timeout")
    timeoutError.name = "TimeoutError"
    const response = new Response("{}", { status: 200 })
    vi.spyOn(response, "text").mockRejectedValue(timeoutError)
    const client = createInferenceApiClient({
      apiHost: "https://api.test",
      token: "test-token",
      timeoutMs: 30_000,
      logger: createLoggerStub(),
      fetchImpl: async () => response,
      now: createClock(0, 1_000, 30_000),
    })

    // Act
    const failure = client.getJson("/jobs", "Jobs status query")

    // Assert
    await expect(failure).rejects.toBeInstanceOf(InferenceApiError)
    await expect(failure).rejects.toThrow("Jobs status query timed out after 30.00s")
  })

  it("wraps connection failures", async () => {
    const client = createInferenceApiClient({
      apiHost: "https://api.test",
      token: "test-token",
      timeoutMs: 30_000,
      logger: createLoggerStub(),
      fetchImpl: async () => {
        throw new TypeError("fetch failed")
      },
      now: createClock(0, 250),
    })

    await expect(client.getJson("/jobs", "Jobs status query")).rejects.toThrow(
      "Jobs status query failed after 0.25s: fetch failed"
    )
  })

  it("passes an abort signal to every request", async () => {
    // Arrange
    const signals: Array<AbortSignal | null | undefined> = []
    const client = createInferenceApiClient({
      apiHost: "https://api.test",
      token: "test-token",
      timeoutMs: 5_000,
      logger: createLoggerStub(),
      fetchImpl: async (_input, init) => {
        signals.push(init?.signal)
        return Response.json([])
      },
    })

    // Act
    await client.getJson("/models", "Available models query")

    // Assert
    expect(signals).toHaveLength(1)
    expect(signals[0]).toBeInstanceOf(AbortSignal)
  })
})
