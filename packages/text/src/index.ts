/**
 * Pattern Graph Text
 *
 * Reads pattern scripts and loads them into the core model.
 *
 * @example
 * ```typescript
 * import { HandlerBuilder } from "@patterngraph/text"
 *
 * const handler = new HandlerBuilder().buildFromString(`
 *   community:Community [
 *     (alice:Person {age: 23})-[:knows]->(bob:Person)
 *   ]
 *   MATCH (a:Person)-[e]->(b) WHERE a.age > 18
 * `)
 *
 * handler.getGraphCache().get("community")
 * const predicates = handler.getPredicates()
 * predicates && formatPredicate(predicates) // (a.__label__ = "Person" AND a.age > 18)
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// HANDLER
// =============================================================================

export { PatternGraphHandler, HandlerBuilder, createHandler } from "./handler"
export type { HandlerConfig } from "./handler"

// =============================================================================
// SYNTAX ERRORS
// =============================================================================

export { failFast, reportAll, skipInvalid } from "./errors"
export type { SyntaxErrorStrategy } from "./errors"

// =============================================================================
// GRAMMAR
// =============================================================================

export { parseScript, ScriptParser, scriptLexer, allTokens } from "./grammar"
export type {
  ParseResult,
  ScriptNode,
  DefinitionNode,
  QueryNode,
  GraphNode,
  PathNode,
  HopNode,
  VertexNode,
  EdgeNode,
  HeaderNode,
} from "./grammar"
export { toEvents } from "./script"
