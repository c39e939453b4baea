/**
 * Semantic Conflict Behaviour Tests
 *
 * Re-references must agree with earlier declarations.
 */

import { describe, it, expect } from "vitest"
import pino from "pino"
import { Loader } from "../../src/loader"
import { InvalidArgumentError, SemanticConflictError } from "../../src/errors"

function createLoader(): Loader {
  return new Loader({ logger: pino({ level: "silent" }) })
}

describe("Semantic Conflicts", () => {
  describe("Labels", () => {
    it("rejects relabeling a vertex", () => {
      const loader = createLoader()

      expect(() =>
        loader.append([
          { type: "vertex", variable: "a", label: "Person" },
          { type: "vertex", variable: "a", label: "City" },
        ]),
      ).toThrow("Vertex 'a' is labeled 'Person' and cannot be relabeled 'City'")
    })

    it("rejects relabeling through a label event", () => {
      const loader = createLoader()

      expect(() =>
        loader.append([
          { type: "vertex", variable: "a", label: "Person" },
          { type: "label", label: "City" },
        ]),
      ).toThrow(SemanticConflictError)
    })

    it("accepts the same label twice", () => {
      const loader = createLoader()
      loader.append([
        { type: "vertex", variable: "a", label: "Person" },
        { type: "vertex", variable: "a", label: "Person" },
      ])

      expect(loader.vertices()).toHaveLength(1)
    })
  })

  describe("Properties", () => {
    it("rejects a different value for the same key", () => {
      const loader = createLoader()

      expect(() =>
        loader.append([
          { type: "vertex", variable: "a", properties: { age: 1 } },
          { type: "vertex", variable: "a", properties: { age: 2 } },
        ]),
      ).toThrow("Vertex 'a' has age = 1 and cannot be redeclared with 2")
    })

    it("distinguishes values of different types", () => {
      const loader = createLoader()

      expect(() =>
        loader.append([
          { type: "vertex", variable: "a", properties: { flag: "true" } },
          { type: "vertex", variable: "a", properties: { flag: true } },
        ]),
      ).toThrow(SemanticConflictError)
    })
  })

  describe("Edges", () => {
    it("rejects a re-referenced edge with another target", () => {
      const loader = createLoader()

      expect(() =>
        loader.append([
          { type: "vertex", variable: "a" },
          { type: "edge", variable: "e" },
          { type: "vertex", variable: "b" },
          { type: "vertex", variable: "a" },
          { type: "edge", variable: "e" },
          { type: "vertex", variable: "c" },
        ]),
      ).toThrow("Edge 'e' is redeclared with a different target vertex")
    })

    it("accepts a re-referenced edge with the same endpoints", () => {
      const loader = createLoader()
      loader.append([
        { type: "vertex", variable: "a" },
        { type: "edge", variable: "e", label: "knows" },
        { type: "vertex", variable: "b" },
        { type: "vertex", variable: "a" },
        { type: "edge", variable: "e" },
        { type: "vertex", variable: "b" },
      ])

      expect(loader.edges()).toHaveLength(1)
      expect(loader.edges()[0]?.label).toBe("knows")
    })

    it("rejects different bounds", () => {
      const loader = createLoader()

      expect(() =>
        loader.append([
          { type: "vertex", variable: "a" },
          { type: "edge", variable: "e", bounds: { lower: 1 } },
          { type: "vertex", variable: "b" },
          { type: "vertex", variable: "a" },
          { type: "edge", variable: "e", bounds: { lower: 1, upper: 2 } },
          { type: "vertex", variable: "b" },
        ]),
      ).toThrow("Edge 'e' is redeclared with different bounds")
    })
  })

  describe("Variables", () => {
    it("rejects a vertex variable reused for an edge", () => {
      const loader = createLoader()

      expect(() =>
        loader.append([
          { type: "vertex", variable: "a" },
          { type: "edge", variable: "a" },
          { type: "vertex" },
        ]),
      ).toThrow("Variable 'a' is bound in the vertex namespace and cannot be used for edges")
    })

    it("rejects a graph variable reused for a vertex", () => {
      const loader = createLoader()
      loader.append([{ type: "graphStart", variable: "g" }, { type: "graphEnd" }])

      expect(() => loader.append([{ type: "vertex", variable: "g" }])).toThrow(SemanticConflictError)
    })

    it("rejects an endpoint name bound to another kind", () => {
      const loader = createLoader()
      loader.append([{ type: "graphStart", variable: "g" }, { type: "graphEnd" }])

      expect(() => loader.append([{ type: "edge", source: "g", target: "x" }])).toThrow(
        "Variable 'g' is bound in the graph namespace and cannot be used for vertices",
      )
    })

    it("keeps synthesized names out of other kinds' variables", () => {
      const loader = createLoader()
      loader.append([{ type: "graphStart", variable: "__v0" }, { type: "vertex" }, { type: "graphEnd" }])

      expect([...loader.getGraphCache(true, true).keys()]).toEqual(["__v0"])
      expect([...loader.getVertexCache(true, true).keys()]).toEqual(["__v1"])
      expect(loader.getVertexCache(true, true).get("__v1")?.id).toBe(0)
    })

    it("rejects a user variable that shadows an anonymous element", () => {
      const loader = createLoader()
      loader.append([{ type: "vertex" }])

      expect(() => loader.append([{ type: "vertex", variable: "__v0" }])).toThrow(
        "Variable '__v0' is reserved for an anonymous vertex",
      )
    })
  })

  describe("Graph ids", () => {
    it("rejects a literal id already in use", () => {
      const loader = createLoader()
      loader.append([{ type: "graphStart" }, { type: "graphEnd" }])

      expect(() => loader.append([{ type: "graphStart", variable: "g", id: 0 }, { type: "graphEnd" }])).toThrow(
        "Graph id 0 is already in use",
      )
    })

    it("rejects a second literal id for a bound graph", () => {
      const loader = createLoader()
      loader.append([{ type: "graphStart", variable: "g", id: 10 }, { type: "graphEnd" }])

      expect(() => loader.append([{ type: "graphStart", variable: "g", id: 11 }, { type: "graphEnd" }])).toThrow(
        "Graph 'g' has id 10 and cannot be redeclared with id 11",
      )
    })

    it("rejects a literal id outside the safe integer range", () => {
      const loader = createLoader()

      expect(() => loader.append([{ type: "graphStart", id: 2 ** 60 + 1 }, { type: "graphEnd" }])).toThrow(
        "Invalid syntax event at events[0].id",
      )
      expect(() => loader.process({ type: "graphStart", id: 2 ** 60 + 1 })).toThrow(InvalidArgumentError)
      expect(loader.graphs()).toEqual([])
    })

    it("accepts the same literal id again", () => {
      const loader = createLoader()
      loader.append([{ type: "graphStart", variable: "g", id: 10 }, { type: "graphEnd" }])
      loader.append([{ type: "graphStart", variable: "g", id: 10 }, { type: "graphEnd" }])

      expect(loader.graphs().map((g) => g.id)).toEqual([10])
    })
  })
})
