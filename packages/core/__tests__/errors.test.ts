/**
 * Tests for error classes
 */

import { describe, it, expect } from "vitest"
import {
  DanglingReferenceError,
  InvalidArgumentError,
  PatternGraphError,
  ScriptSyntaxError,
  SemanticConflictError,
} from "../src/errors"

describe("Errors", () => {
  it("should share the base class", () => {
    const errors = [
      new InvalidArgumentError("bad", "input"),
      new ScriptSyntaxError([{ message: "oops" }]),
      new SemanticConflictError("clash", "a"),
      new DanglingReferenceError("e", "target"),
    ]

    for (const error of errors) {
      expect(error).toBeInstanceOf(PatternGraphError)
      expect(error).toBeInstanceOf(Error)
    }
    expect(errors.map((error) => error.name)).toEqual([
      "InvalidArgumentError",
      "ScriptSyntaxError",
      "SemanticConflictError",
      "DanglingReferenceError",
    ])
  })

  it("should keep the cause", () => {
    const cause = new Error("ENOENT")
    const error = new InvalidArgumentError("Cannot read script file 'x'", "path", cause)

    expect(error.cause).toBe(cause)
    expect(error.argument).toBe("path")
  })

  it("should describe syntax issues", () => {
    expect(new ScriptSyntaxError([]).message).toBe("Syntax error")
    expect(new ScriptSyntaxError([{ message: "bad token", line: 3, column: 7, token: "#" }]).message).toBe(
      "Syntax error at 3:7: bad token",
    )
  })

  it("should name the dangling reference", () => {
    const error = new DanglingReferenceError("e", "source", "x")

    expect(error.message).toBe("Edge 'e' has a dangling source vertex 'x'")
    expect(error).toMatchObject({ edge: "e", endpoint: "source", reference: "x" })
  })
})
