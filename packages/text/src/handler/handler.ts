/**
 * Pattern Graph Handler
 *
 * Entry point for scripts: parses text, feeds the resulting events to a
 * loader and exposes what was loaded.
 */

import {
  InvalidArgumentError,
  Loader,
  createLogger,
  type Edge,
  type Graph,
  type LoaderConfig,
  type Logger,
  type Predicate,
  type SyntaxEvent,
  type Vertex,
} from "@patterngraph/core"
import { failFast, type SyntaxErrorStrategy } from "../errors"
import { parseScript } from "../grammar"
import { toEvents } from "../script"

/**
 * Loader options plus the syntax error strategy.
 */
export interface HandlerConfig extends LoaderConfig {
  /** What to do with fragments that fail to parse (default: failFast) */
  errorStrategy?: SyntaxErrorStrategy
}

export class PatternGraphHandler {
  private readonly loader: Loader
  private readonly errorStrategy: SyntaxErrorStrategy
  private readonly logger: Logger

  constructor(config: HandlerConfig = {}) {
    const { errorStrategy = failFast, logger = createLogger(), ...loaderConfig } = config
    this.loader = new Loader({ ...loaderConfig, logger })
    this.errorStrategy = errorStrategy
    this.logger = logger.child({ component: "Handler" })
  }

  /**
   * Load a script fragment or a list of syntax events. Everything loaded
   * so far stays in scope for later fragments.
   * @throws InvalidArgumentError if the input is absent or empty
   * @throws ScriptSyntaxError if the script does not parse and the strategy rejects it
   */
  append(input: string | readonly SyntaxEvent[]): void {
    if (typeof input === "string") {
      this.appendScript(input)
      return
    }
    if (input == null || input.length === 0) {
      throw new InvalidArgumentError("Events must not be empty", "input")
    }
    this.loader.append(input)
  }

  private appendScript(source: string): void {
    if (source.trim() === "") {
      throw new InvalidArgumentError("Script must not be empty", "input")
    }

    const { script, issues } = parseScript(source)
    if (!script) {
      this.logger.debug({ issues: issues.length, strategy: this.errorStrategy.name }, "Script rejected")
      this.errorStrategy.handle(issues, source)
      return
    }

    const events = toEvents(script)
    // a script of comments only declares nothing
    if (events.length > 0) {
      this.loader.append(events)
    }
  }

  // ===========================================================================
  // ACCESSORS
  // ===========================================================================

  getGraphs(): Graph[] {
    return this.loader.graphs()
  }

  getVertices(): Vertex[] {
    return this.loader.vertices()
  }

  getEdges(): Edge[] {
    return this.loader.edges()
  }

  /**
   * The combined WHERE clauses and query constraints in CNF, if any.
   */
  getPredicates(): Predicate | undefined {
    return this.loader.predicates()
  }

  getGraphCache(includeUserDefined = true, includeAutoGenerated = false): Map<string, Graph> {
    return this.loader.getGraphCache(includeUserDefined, includeAutoGenerated)
  }

  getVertexCache(includeUserDefined = true, includeAutoGenerated = false): Map<string, Vertex> {
    return this.loader.getVertexCache(includeUserDefined, includeAutoGenerated)
  }

  getEdgeCache(includeUserDefined = true, includeAutoGenerated = false): Map<string, Edge> {
    return this.loader.getEdgeCache(includeUserDefined, includeAutoGenerated)
  }
}

export function createHandler(config: HandlerConfig = {}): PatternGraphHandler {
  return new PatternGraphHandler(config)
}
