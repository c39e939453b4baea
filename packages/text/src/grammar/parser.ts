/**
 * Pattern Language Parser
 *
 * chevrotain grammar with embedded actions: rules return parse tree nodes
 * directly. Code that inspects sub-results runs inside `ACTION` so that it is
 * skipped while chevrotain records the grammar.
 */

import { EmbeddedActionsParser, tokenMatcher, type ILexingError, type IRecognitionException, type IToken } from "chevrotain"
import {
  and,
  comparison,
  literal,
  not,
  or,
  property,
  variable,
  type ComparisonOperator,
  type EdgeBounds,
  type LiteralValue,
  type Operand,
  type Predicate,
  type PropertyValue,
  type SyntaxIssue,
} from "@patterngraph/core"
import * as t from "./tokens"
import type {
  DefinitionNode,
  EdgeNode,
  GraphNode,
  HeaderNode,
  PathNode,
  QueryNode,
  ScriptNode,
  HopNode,
  VertexNode,
} from "./types"

// =============================================================================
// GRAMMAR
// =============================================================================

export class ScriptParser extends EmbeddedActionsParser {
  constructor() {
    super(t.allTokens)
    this.performSelfAnalysis()
  }

  public readonly script = this.RULE("script", (): ScriptNode => {
    const definitions: DefinitionNode[] = []
    this.MANY(() => {
      const definition = this.SUBRULE(this.definition)
      this.ACTION(() => definitions.push(definition))
      this.OPTION(() => this.CONSUME(t.Comma))
    })
    return { definitions }
  })

  private readonly definition = this.RULE("definition", (): DefinitionNode =>
    this.OR<DefinitionNode>([
      { ALT: () => this.SUBRULE(this.query) },
      { ALT: () => this.SUBRULE(this.path) },
      { ALT: () => this.SUBRULE(this.graph) },
    ]),
  )

  // ---------------------------------------------------------------------------
  // patterns
  // ---------------------------------------------------------------------------

  private readonly query = this.RULE("query", (): QueryNode => {
    const patterns: Array<PathNode | GraphNode> = []
    this.CONSUME(t.Match)
    this.AT_LEAST_ONE_SEP({
      SEP: t.Comma,
      DEF: () => {
        const pattern = this.SUBRULE(this.pattern)
        this.ACTION(() => patterns.push(pattern))
      },
    })
    const where = this.OPTION(() => {
      this.CONSUME(t.Where)
      return this.SUBRULE(this.orExpression)
    })
    return { type: "query", patterns, where }
  })

  private readonly pattern = this.RULE("pattern", (): PathNode | GraphNode =>
    this.OR<PathNode | GraphNode>([
      { ALT: () => this.SUBRULE(this.path) },
      { ALT: () => this.SUBRULE(this.graph) },
    ]),
  )

  private readonly graph = this.RULE("graph", (): GraphNode => {
    const header = this.SUBRULE(this.header)
    const paths: PathNode[] = []
    this.CONSUME(t.LBracket)
    this.MANY(() => {
      const path = this.SUBRULE(this.path)
      this.ACTION(() => paths.push(path))
      this.OPTION(() => this.CONSUME(t.Comma))
    })
    this.CONSUME(t.RBracket)
    return this.ACTION((): GraphNode => ({ type: "graph", ...header, paths }))
  })

  private readonly path = this.RULE("path", (): PathNode => {
    const start = this.SUBRULE(this.vertex)
    const hops: HopNode[] = []
    this.MANY(() => {
      const edge = this.SUBRULE(this.edge)
      const vertex = this.SUBRULE2(this.vertex)
      this.ACTION(() => hops.push({ edge, vertex }))
    })
    return { type: "path", start, hops }
  })

  private readonly vertex = this.RULE("vertex", (): VertexNode => {
    this.CONSUME(t.LParen)
    const header = this.SUBRULE(this.header)
    this.CONSUME(t.RParen)
    return header
  })

  private readonly edge = this.RULE("edge", (): EdgeNode =>
    this.OR<EdgeNode>([
      {
        // -[...]->
        ALT: () => {
          this.CONSUME(t.Dash)
          const body = this.OPTION(() => this.SUBRULE(this.edgeBody))
          this.CONSUME(t.RightArrow)
          return this.ACTION((): EdgeNode => ({ ...(body ?? emptyHeader()), direction: "out" }))
        },
      },
      {
        // <-[...]-
        ALT: () => {
          this.CONSUME(t.LeftArrow)
          const body = this.OPTION2(() => this.SUBRULE2(this.edgeBody))
          this.CONSUME2(t.Dash)
          return this.ACTION((): EdgeNode => ({ ...(body ?? emptyHeader()), direction: "in" }))
        },
      },
    ]),
  )

  private readonly edgeBody = this.RULE("edgeBody", (): Omit<EdgeNode, "direction"> => {
    this.CONSUME(t.LBracket)
    const header = this.SUBRULE(this.header)
    const bounds = this.OPTION(() => this.SUBRULE(this.edgeLength))
    this.CONSUME(t.RBracket)
    return this.ACTION(() => (bounds ? { ...header, bounds } : header))
  })

  private readonly edgeLength = this.RULE("edgeLength", (): EdgeBounds => {
    this.CONSUME(t.Star)
    const lower = this.OPTION(() => this.CONSUME(t.IntegerLiteral))
    const range = this.OPTION2(() => {
      this.CONSUME(t.Range)
      return { upper: this.OPTION3(() => this.CONSUME2(t.IntegerLiteral)) }
    })
    return this.ACTION(() => toBounds(lower, range?.upper, range !== undefined))
  })

  private readonly header = this.RULE("header", (): HeaderNode => {
    const name = this.OPTION(() => this.CONSUME(t.Identifier))
    const label = this.OPTION2(() => {
      this.CONSUME(t.Colon)
      return this.CONSUME2(t.Identifier)
    })
    const properties = this.OPTION3(() => this.SUBRULE(this.propertyMap))
    return this.ACTION(() => ({
      variable: name?.image,
      label: label?.image,
      properties: properties ?? {},
    }))
  })

  private readonly propertyMap = this.RULE("propertyMap", (): Record<string, PropertyValue> => {
    const entries: Array<[string, PropertyValue]> = []
    this.CONSUME(t.LCurly)
    this.MANY_SEP({
      SEP: t.Comma,
      DEF: () => {
        const key = this.CONSUME(t.Identifier)
        this.CONSUME(t.Colon)
        const value = this.SUBRULE(this.propertyValue)
        this.ACTION(() => entries.push([key.image, value]))
      },
    })
    this.CONSUME(t.RCurly)
    return this.ACTION(() => Object.fromEntries(entries))
  })

  // ---------------------------------------------------------------------------
  // literals
  // ---------------------------------------------------------------------------

  private readonly propertyValue = this.RULE("propertyValue", (): PropertyValue =>
    this.OR<PropertyValue>([
      {
        ALT: () => {
          const token = this.CONSUME(t.StringLiteral)
          return this.ACTION(() => unquote(token.image))
        },
      },
      {
        ALT: () => {
          const token = this.CONSUME(t.FloatLiteral)
          return this.ACTION(() => Number(token.image))
        },
      },
      {
        ALT: () => {
          const token = this.CONSUME(t.IntegerLiteral)
          return this.ACTION(() => Number(token.image))
        },
      },
      {
        ALT: () => {
          this.CONSUME(t.True)
          return true
        },
      },
      {
        ALT: () => {
          this.CONSUME(t.False)
          return false
        },
      },
    ]),
  )

  private readonly literalValue = this.RULE("literalValue", (): LiteralValue =>
    this.OR<LiteralValue>([
      { ALT: () => this.SUBRULE(this.propertyValue) },
      {
        ALT: () => {
          this.CONSUME(t.Null)
          return null
        },
      },
    ]),
  )

  // ---------------------------------------------------------------------------
  // expressions: OR < XOR < AND < NOT
  // ---------------------------------------------------------------------------

  private readonly orExpression = this.RULE("orExpression", (): Predicate => {
    const first = this.SUBRULE(this.xorExpression)
    const rest: Predicate[] = []
    this.MANY(() => {
      this.CONSUME(t.Or)
      const next = this.SUBRULE2(this.xorExpression)
      this.ACTION(() => rest.push(next))
    })
    return this.ACTION(() => (rest.length === 0 ? first : or(first, ...rest)))
  })

  private readonly xorExpression = this.RULE("xorExpression", (): Predicate => {
    const first = this.SUBRULE(this.andExpression)
    const rest: Predicate[] = []
    this.MANY(() => {
      this.CONSUME(t.Xor)
      const next = this.SUBRULE2(this.andExpression)
      this.ACTION(() => rest.push(next))
    })
    return this.ACTION(() => rest.reduce(xor, first))
  })

  private readonly andExpression = this.RULE("andExpression", (): Predicate => {
    const first = this.SUBRULE(this.notExpression)
    const rest: Predicate[] = []
    this.MANY(() => {
      this.CONSUME(t.And)
      const next = this.SUBRULE2(this.notExpression)
      this.ACTION(() => rest.push(next))
    })
    return this.ACTION(() => (rest.length === 0 ? first : and(first, ...rest)))
  })

  private readonly notExpression = this.RULE("notExpression", (): Predicate =>
    this.OR<Predicate>([
      {
        ALT: () => {
          this.CONSUME(t.Not)
          const operand = this.SUBRULE(this.notExpression)
          return this.ACTION(() => not(operand))
        },
      },
      { ALT: () => this.SUBRULE(this.atom) },
    ]),
  )

  private readonly atom = this.RULE("atom", (): Predicate =>
    this.OR<Predicate>([
      {
        ALT: () => {
          this.CONSUME(t.LParen)
          const inner = this.SUBRULE(this.orExpression)
          this.CONSUME(t.RParen)
          return inner
        },
      },
      { ALT: () => this.SUBRULE(this.comparisonExpression) },
    ]),
  )

  private readonly comparisonExpression = this.RULE("comparisonExpression", (): Predicate => {
    const left = this.SUBRULE(this.operand)
    const operator = this.CONSUME(t.ComparisonOperator)
    const right = this.SUBRULE2(this.operand)
    return this.ACTION(() => comparison(left, operatorOf(operator), right))
  })

  private readonly operand = this.RULE("operand", (): Operand =>
    this.OR<Operand>([
      {
        ALT: () => {
          const name = this.CONSUME(t.Identifier)
          const key = this.OPTION(() => {
            this.CONSUME(t.Dot)
            return this.CONSUME2(t.Identifier)
          })
          return this.ACTION(() => (key ? property(name.image, key.image) : variable(name.image)))
        },
      },
      {
        ALT: () => {
          const value = this.SUBRULE(this.literalValue)
          return this.ACTION(() => literal(value))
        },
      },
    ]),
  )
}

// =============================================================================
// HELPERS
// =============================================================================

function emptyHeader(): HeaderNode {
  return { properties: {} }
}

/**
 * `*` → 1..∞, `*n` → n..n, `*n..m`, `*n..` → n..∞, `*..m` → 1..m
 */
function toBounds(lower: IToken | undefined, upper: IToken | undefined, isRange: boolean): EdgeBounds {
  const from = lower ? Number(lower.image) : 1
  if (!isRange) {
    return lower ? { lower: from, upper: from } : { lower: from }
  }
  return upper ? { lower: from, upper: Number(upper.image) } : { lower: from }
}

/**
 * a XOR b = (a AND NOT b) OR (NOT a AND b)
 */
function xor(left: Predicate, right: Predicate): Predicate {
  return or(and(left, not(right)), and(not(left), right))
}

function operatorOf(token: IToken): ComparisonOperator {
  if (tokenMatcher(token, t.NotEqual)) return "neq"
  if (tokenMatcher(token, t.LessEqual)) return "lte"
  if (tokenMatcher(token, t.GreaterEqual)) return "gte"
  if (tokenMatcher(token, t.Less)) return "lt"
  if (tokenMatcher(token, t.Greater)) return "gt"
  return "eq"
}

const ESCAPES: Record<string, string> = { n: "\n", r: "\r", t: "\t" }

function unquote(image: string): string {
  return image.slice(1, -1).replace(/\\(.)/g, (_, char: string) => ESCAPES[char] ?? char)
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export interface ParseResult {
  /** Absent when the script has syntax issues */
  script?: ScriptNode
  issues: SyntaxIssue[]
}

const parser = new ScriptParser()

/**
 * Tokenize and parse a script. Lexer issues stop before parsing, and so do
 * integer literals a number cannot hold exactly.
 */
export function parseScript(text: string): ParseResult {
  const lexed = t.scriptLexer.tokenize(text)
  if (lexed.errors.length > 0) {
    return { issues: lexed.errors.map((error) => lexingIssue(error, text)) }
  }

  const unsafe = lexed.tokens.filter(isUnsafeInteger)
  if (unsafe.length > 0) {
    return { issues: unsafe.map(unsafeIntegerIssue) }
  }

  parser.input = lexed.tokens
  const script = parser.script()
  if (parser.errors.length > 0) {
    return { issues: parser.errors.map(recognitionIssue) }
  }
  return { script, issues: [] }
}

function lexingIssue(error: ILexingError, text: string): SyntaxIssue {
  return {
    message: error.message,
    line: error.line,
    column: error.column,
    token: text.slice(error.offset, error.offset + error.length),
  }
}

function isUnsafeInteger(token: IToken): boolean {
  return tokenMatcher(token, t.IntegerLiteral) && !Number.isSafeInteger(Number(token.image))
}

function unsafeIntegerIssue(token: IToken): SyntaxIssue {
  return {
    message: `integer literal out of range: ${token.image}`,
    line: token.startLine,
    column: token.startColumn,
    token: token.image,
  }
}

function recognitionIssue(error: IRecognitionException): SyntaxIssue {
  const { token } = error
  // the end-of-input token has no position
  return {
    message: error.message,
    line: Number.isFinite(token.startLine) ? token.startLine : undefined,
    column: Number.isFinite(token.startColumn) ? token.startColumn : undefined,
    token: token.image === "" ? undefined : token.image,
  }
}
