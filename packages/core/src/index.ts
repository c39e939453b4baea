/**
 * Pattern Graph Core
 *
 * Builds an in-memory property graph model and a CNF filter predicate from
 * a stream of syntax events.
 *
 * @example
 * ```typescript
 * import { Loader, comparison, property, literal } from '@patterngraph/core'
 *
 * const loader = new Loader({ useDefaultEdgeLabel: false })
 *
 * loader.append([
 *   { type: 'graphStart', variable: 'g', label: 'Community' },
 *   { type: 'vertex', variable: 'alice', label: 'Person', properties: { age: 23 } },
 *   { type: 'edge', variable: 'e', label: 'knows' },
 *   { type: 'vertex', variable: 'bob', label: 'Person' },
 *   { type: 'graphEnd' },
 * ])
 *
 * loader.append([
 *   { type: 'predicate', predicate: comparison(property('alice', 'age'), 'gt', literal(18)) },
 * ])
 *
 * loader.getVertexCache().get('alice') // { id: 0, label: 'Person', properties: { age: 23 } }
 * loader.predicates() // alice.age > 18
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// LOADER
// =============================================================================

export {
  Loader,
  resolveLoaderConfig,
  loaderConfigSchema,
  parseEvents,
  syntaxEventSchema,
  predicateSchema,
  DEFAULT_GRAPH_LABEL,
  DEFAULT_VERTEX_LABEL,
  DEFAULT_EDGE_LABEL,
} from './loader'
export type {
  LoaderConfig,
  ResolvedLoaderConfig,
  SyntaxEvent,
  GraphStartEvent,
  GraphEndEvent,
  QueryStartEvent,
  QueryEndEvent,
  VertexEvent,
  EdgeEvent,
  PropertyEvent,
  LabelEvent,
  PredicateEvent,
} from './loader'

// =============================================================================
// MODEL
// =============================================================================

export type {
  PropertyValue,
  Properties,
  EntityKind,
  Element,
  Graph,
  Vertex,
  Edge,
  EdgeBounds,
} from './model'

// =============================================================================
// IDENTIFIERS & VARIABLES
// =============================================================================

export { continuousId, IdSequence } from './ids'
export type { IdGenerator } from './ids'
export { VariableCache } from './cache'
export type { Resolution } from './cache'

// =============================================================================
// PREDICATES
// =============================================================================

export {
  literal,
  property,
  variable,
  comparison,
  and,
  or,
  not,
  combine,
  toCnf,
  isCnf,
  formatPredicate,
  formatOperator,
  LABEL_KEY,
} from './predicate'
export type {
  ComparisonOperator,
  LiteralValue,
  LiteralOperand,
  PropertyOperand,
  VariableOperand,
  Operand,
  Comparison,
  And,
  Or,
  Not,
  Predicate,
  PredicateLiteral,
} from './predicate'

// =============================================================================
// ERRORS
// =============================================================================

export {
  PatternGraphError,
  InvalidArgumentError,
  ScriptSyntaxError,
  SemanticConflictError,
  DanglingReferenceError,
} from './errors'
export type { SyntaxIssue } from './errors'

// =============================================================================
// LOGGING
// =============================================================================

export { createLogger, resolveLogLevel, LOG_LEVEL_ENV } from './utils'
export type { Logger, LoggerOptions } from './utils'
