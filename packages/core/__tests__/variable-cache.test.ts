/**
 * Tests for the variable cache
 */

import { describe, it, expect } from "vitest"
import { VariableCache } from "../src/cache"
import { SemanticConflictError } from "../src/errors"
import { continuousId, IdSequence } from "../src/ids"

function vertexCache(): VariableCache {
  return new VariableCache("vertex", new IdSequence(continuousId(), "vertex"))
}

describe("VariableCache", () => {
  describe("resolveOrCreate", () => {
    it("should bind a new user variable", () => {
      const cache = vertexCache()

      expect(cache.resolveOrCreate("alice")).toEqual({ id: 0, variable: "alice", isNew: true })
    })

    it("should return the existing binding on re-reference", () => {
      const cache = vertexCache()
      cache.resolveOrCreate("alice")
      cache.resolveOrCreate("bob")

      expect(cache.resolveOrCreate("alice")).toEqual({ id: 0, variable: "alice", isNew: false })
    })

    it("should synthesize names for anonymous elements", () => {
      const cache = vertexCache()

      expect(cache.resolveOrCreate()).toEqual({ id: 0, variable: "__v0", isNew: true })
      expect(cache.resolveOrCreate()).toEqual({ id: 1, variable: "__v1", isNew: true })
    })

    it("should use the kind's prefix for synthesized names", () => {
      const graphs = new VariableCache("graph", new IdSequence(continuousId(), "graph"))
      const edges = new VariableCache("edge", new IdSequence(continuousId(), "edge"))

      expect(graphs.resolveOrCreate().variable).toBe("__g0")
      expect(edges.resolveOrCreate().variable).toBe("__e0")
    })

    it("should skip synthesized names the user already took", () => {
      const cache = vertexCache()
      cache.resolveOrCreate("__v0")

      expect(cache.resolveOrCreate()).toEqual({ id: 1, variable: "__v1", isNew: true })
    })

    it("should skip synthesized names bound outside the cache", () => {
      const taken = new Set(["__v0", "__v1"])
      const cache = new VariableCache("vertex", new IdSequence(continuousId(), "vertex"), (name) => taken.has(name))

      expect(cache.resolveOrCreate()).toEqual({ id: 0, variable: "__v2", isNew: true })
    })

    it("should reject a user variable equal to a synthesized name", () => {
      const cache = vertexCache()
      cache.resolveOrCreate()

      expect(() => cache.resolveOrCreate("__v0")).toThrow(SemanticConflictError)
    })

    it("should bind a preset id instead of drawing one", () => {
      const ids = new IdSequence(continuousId(), "graph")
      const cache = new VariableCache("graph", ids)
      ids.claim(42)

      expect(cache.resolveOrCreate("g", 42)).toEqual({ id: 42, variable: "g", isNew: true })
      expect(cache.resolveOrCreate("h")).toEqual({ id: 0, variable: "h", isNew: true })
    })
  })

  describe("lookup", () => {
    it("should find user and synthesized names", () => {
      const cache = vertexCache()
      cache.resolveOrCreate("alice")
      cache.resolveOrCreate()

      expect(cache.lookup("alice")).toBe(0)
      expect(cache.lookup("__v0")).toBe(1)
      expect(cache.lookup("bob")).toBeUndefined()
      expect(cache.has("bob")).toBe(false)
    })

    it("should map ids back to names", () => {
      const cache = vertexCache()
      cache.resolveOrCreate()
      cache.resolveOrCreate("alice")

      expect(cache.nameOf(1)).toBe("alice")
      expect(cache.isAutoGenerated("__v0")).toBe(true)
      expect(cache.isAutoGenerated("alice")).toBe(false)
    })
  })

  describe("getCache", () => {
    function populated(): VariableCache {
      const cache = vertexCache()
      cache.resolveOrCreate("alice")
      cache.resolveOrCreate()
      cache.resolveOrCreate("bob")
      return cache
    }

    it("should return user variables by default", () => {
      expect([...populated().getCache()]).toEqual([
        ["alice", 0],
        ["bob", 2],
      ])
    })

    it("should return synthesized variables on request", () => {
      expect([...populated().getCache(false, true)]).toEqual([["__v0", 1]])
    })

    it("should return the union of both partitions", () => {
      const all = populated().getCache(true, true)

      expect(all.size).toBe(3)
      expect(all.get("__v0")).toBe(1)
      expect(all.get("bob")).toBe(2)
    })

    it("should return nothing when both partitions are excluded", () => {
      expect(populated().getCache(false, false).size).toBe(0)
    })

    it("should return a snapshot", () => {
      const cache = populated()
      const snapshot = cache.getCache()
      cache.resolveOrCreate("carol")

      expect(snapshot.has("carol")).toBe(false)
    })
  })
})
