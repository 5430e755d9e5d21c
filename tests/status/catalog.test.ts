import { describe, expect, it } from "vitest"

import {
  dedupeModels,
  normalizeCatalog,
  summarizeClusterConfiguration,
} from "../../src/status/catalog.js"
import type { ModelRecord } from "../../src/status/types.js"

const createClustersBody = () => {
  return {
    clusters: {
      sophia: {
        base_url: "/resource_server/sophia",
        frameworks: {
          vllm: {
            models: ["m1", "m2"],
            endpoints: {
              chat: "/vllm/v1/chat/completions/",
              completion: "/vllm/v1/completions",
            },
          },
          infinity: {
            models: ["embedder"],
            endpoints: {},
          },
        },
      },
    },
  }
}

describe("normalizeCatalog", () => {
  it("flattens clusters, frameworks and models with chat urls", () => {
    // Arrange
    const body = createClustersBody()

    // Act
    const records = normalizeCatalog(body, { apiHost: "https://api.test" })

    // Assert
    expect(records).toEqual([
      {
        name: "m1",
        cluster: "sophia",
        framework: "vllm",
        chatUrl: "https://api.test/resource_server/sophia/vllm/v1/chat/completions",
        source: "clusters",
      },
      {
        name: "m2",
        cluster: "sophia",
        framework: "vllm",
        chatUrl: "https://api.test/resource_server/sophia/vllm/v1/chat/completions",
        source: "clusters",
      },
      {
        name: "embedder",
        cluster: "sophia",
        framework: "infinity",
        chatUrl: null,
        source: "clusters",
      },
    ])
  })

  it("uses the default api host for chat urls", () => {
    const [first] = normalizeCatalog(createClustersBody())

    expect(first?.chatUrl).toBe(
      "https://inference-api.alcf.anl.gov/resource_server/sophia/vllm/v1/chat/completions"
    )
  })

  it("reads endpoint lists by model then name", () => {
    // Arrange
    const body = { endpoints: [{ model: "a", name: "ignored" }, { name: "b" }, {}, "skip-me"] }

    // Act
    const records = normalizeCatalog(body)

    // Assert
    expect(records.map((record) => record.name)).toEqual(["a", "b", "Unknown"])
    expect(records[0]).toEqual({
      name: "a",
      cluster: "default",
      framework: "default",
      chatUrl: null,
      source: "endpoints",
    })
  })

  it("reads data lists by id then name", () => {
    const records = normalizeCatalog({ data: [{ id: "x", name: "ignored" }, { name: "y" }] })

    expect(records.map((record) => [record.name, record.source])).toEqual([
      ["x", "data"],
      ["y", "data"],
    ])
  })

  it("runs bare lists through field guessing and drops nameless items", () => {
    // Arrange
    const body = [{ endpoint: "e1", status: "Live" }, { Models: ["j1", "j2"] }, { foo: 1 }, 7]

    // Act
    const records = normalizeCatalog(body)

    // Assert
    expect(records.map((record) => record.name)).toEqual(["e1", "j1 (+1 others)"])
    expect(records.every((record) => record.source === "direct_list")).toBe(true)
  })

  it("lets clusters win over other shapes in the same body", () => {
    // Arrange
    const body = {
      ...createClustersBody(),
      endpoints: [{ model: "from-endpoints" }],
      data: [{ id: "from-data" }],
    }

    // Act
    const names = normalizeCatalog(body).map((record) => record.name)

    // Assert
    expect(names).toEqual(["m1", "m2", "embedder"])
  })

  it("returns no records for unknown shapes", () => {
    expect(normalizeCatalog({ foo: 1 })).toEqual([])
    expect(normalizeCatalog({ endpoints: "not-a-list" })).toEqual([])
    expect(normalizeCatalog("text")).toEqual([])
    expect(normalizeCatalog(null)).toEqual([])
  })

  it("is a pure function of its input", () => {
    const body = createClustersBody()

    expect(normalizeCatalog(body)).toEqual(normalizeCatalog(body))
  })
})

describe("dedupeModels", () => {
  it("keeps the first record seen for each name", () => {
    // Arrange
    const records: ModelRecord[] = [
      { name: "m1", cluster: "sophia", framework: "vllm", chatUrl: null, source: "clusters" },
      { name: "m2", cluster: "default", framework: "default", chatUrl: null, source: "data" },
      { name: "m1", cluster: "polaris", framework: "vllm", chatUrl: null, source: "endpoints" },
    ]

    // Act
    const unique = dedupeModels(records)

    // Assert
    expect(unique.map((record) => [record.name, record.cluster])).toEqual([
      ["m1", "sophia"],
      ["m2", "default"],
    ])
  })

  it("treats names case-sensitively", () => {
    const records: ModelRecord[] = [
      { name: "M1", cluster: "a", framework: "f", chatUrl: null, source: "data" },
      { name: "m1", cluster: "b", framework: "f", chatUrl: null, source: "data" },
    ]

    expect(dedupeModels(records)).toHaveLength(2)
  })
})

describe("summarizeClusterConfiguration", () => {
  it("lists frameworks with model counts and endpoint kinds", () => {
    expect(summarizeClusterConfiguration(createClustersBody())).toEqual([
      {
        cluster: "sophia",
        frameworks: [
          { framework: "vllm", modelCount: 2, endpointKinds: ["chat", "completion"] },
          { framework: "infinity", modelCount: 1, endpointKinds: [] },
        ],
      },
    ])
  })

  it("returns nothing for bodies without clusters", () => {
    expect(summarizeClusterConfiguration([{ id: "x" }])).toEqual([])
  })
})
