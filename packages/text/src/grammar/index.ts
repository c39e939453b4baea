/**
 * Grammar Module
 *
 * Tokens, parse tree types and the chevrotain parser of the pattern language.
 */

export { ScriptParser, parseScript } from "./parser"
export type { ParseResult } from "./parser"
export { allTokens, scriptLexer } from "./tokens"
export type {
  ScriptNode,
  DefinitionNode,
  QueryNode,
  GraphNode,
  PathNode,
  HopNode,
  VertexNode,
  EdgeNode,
  HeaderNode,
} from "./types"
