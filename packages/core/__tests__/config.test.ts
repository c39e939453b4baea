/**
 * Tests for loader configuration and logging
 */

import { describe, it, expect } from "vitest"
import pino from "pino"
import {
  DEFAULT_EDGE_LABEL,
  DEFAULT_GRAPH_LABEL,
  DEFAULT_VERTEX_LABEL,
  defaultLabelFor,
  resolveLoaderConfig,
  type LoaderConfig,
} from "../src/loader"
import { InvalidArgumentError } from "../src/errors"
import { createLogger, LOG_LEVEL_ENV, resolveLogLevel } from "../src/utils"

describe("Loader configuration", () => {
  it("should apply defaults", () => {
    const config = resolveLoaderConfig()

    expect(config.defaultGraphLabel).toBe(DEFAULT_GRAPH_LABEL)
    expect(config.defaultVertexLabel).toBe("__VERTEX")
    expect(config.defaultEdgeLabel).toBe(DEFAULT_EDGE_LABEL)
    expect(config.useDefaultGraphLabel).toBe(true)
    expect(config.useDefaultVertexLabel).toBe(true)
    expect(config.useDefaultEdgeLabel).toBe(true)
    expect(config.nextVertexId()).toBe(0)
    expect(config.nextVertexId()).toBe(1)
  })

  it("should give every kind its own default generator", () => {
    const config = resolveLoaderConfig()
    config.nextGraphId()
    config.nextGraphId()

    expect(config.nextEdgeId()).toBe(0)
  })

  it("should keep provided values", () => {
    const logger = pino({ level: "silent" })
    const nextVertexId = () => 7
    const config = resolveLoaderConfig({
      defaultVertexLabel: "Node",
      useDefaultEdgeLabel: false,
      nextVertexId,
      logger,
    })

    expect(config.defaultVertexLabel).toBe("Node")
    expect(config.useDefaultEdgeLabel).toBe(false)
    expect(config.nextVertexId).toBe(nextVertexId)
    expect(config.logger).toBe(logger)
  })

  it("should reject an empty default label", () => {
    expect(() => resolveLoaderConfig({ defaultVertexLabel: "" })).toThrow(InvalidArgumentError)
    expect(() => resolveLoaderConfig({ defaultVertexLabel: "" })).toThrow(
      "Invalid loader configuration: defaultVertexLabel: Label must not be empty",
    )
  })

  it("should reject a generator that is not a function", () => {
    const config: LoaderConfig = {}
    Object.assign(config, { nextGraphId: 5 })

    expect(() => resolveLoaderConfig(config)).toThrow(
      "Invalid loader configuration: nextGraphId: Id generator must be a function",
    )
  })

  it("should name the offending field", () => {
    try {
      resolveLoaderConfig({ defaultEdgeLabel: "" })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidArgumentError)
      expect(error).toMatchObject({ argument: "defaultEdgeLabel" })
    }
  })

  describe("defaultLabelFor", () => {
    it("should return the label of each kind", () => {
      const config = resolveLoaderConfig()

      expect(defaultLabelFor(config, "graph")).toBe(DEFAULT_GRAPH_LABEL)
      expect(defaultLabelFor(config, "vertex")).toBe(DEFAULT_VERTEX_LABEL)
      expect(defaultLabelFor(config, "edge")).toBe(DEFAULT_EDGE_LABEL)
    })

    it("should return nothing when defaulting is disabled", () => {
      const config = resolveLoaderConfig({ useDefaultVertexLabel: false })

      expect(defaultLabelFor(config, "vertex")).toBeUndefined()
      expect(defaultLabelFor(config, "graph")).toBe(DEFAULT_GRAPH_LABEL)
    })
  })
})

describe("Logging", () => {
  describe("resolveLogLevel", () => {
    it("should prefer the explicit level", () => {
      expect(resolveLogLevel("debug", { [LOG_LEVEL_ENV]: "warn" })).toBe("debug")
    })

    it("should read the environment", () => {
      expect(resolveLogLevel(undefined, { [LOG_LEVEL_ENV]: "WARN" })).toBe("warn")
    })

    it("should be silent by default", () => {
      expect(resolveLogLevel(undefined, {})).toBe("silent")
      expect(resolveLogLevel(undefined, { [LOG_LEVEL_ENV]: "" })).toBe("silent")
    })

    it("should reject unknown levels", () => {
      expect(() => resolveLogLevel(undefined, { [LOG_LEVEL_ENV]: "loud" })).toThrow(
        "Unknown log level in PATTERNGRAPH_LOG_LEVEL: 'loud'",
      )
    })
  })

  describe("createLogger", () => {
    it("should write named JSON records", () => {
      const lines: string[] = []
      const logger = createLogger({ level: "info", base: { run: 1 } }, { write: (line: string) => lines.push(line) })

      logger.info({ count: 2 }, "Loaded")

      expect(lines).toHaveLength(1)
      expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
        name: "patterngraph",
        run: 1,
        count: 2,
        msg: "Loaded",
        level: 30,
      })
    })

    it("should drop records below the level", () => {
      const lines: string[] = []
      const logger = createLogger({ level: "warn" }, { write: (line: string) => lines.push(line) })

      logger.info("ignored")
      logger.warn("kept")

      expect(lines).toHaveLength(1)
    })
  })
})
