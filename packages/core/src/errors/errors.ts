/**
 * Custom Error Classes
 */

/**
 * A single problem reported by the tokenizer or the parser.
 */
export interface SyntaxIssue {
  message: string
  /** 1-based line of the offending token, when known */
  line?: number
  /** 1-based column of the offending token, when known */
  column?: number
  /** Offending token text */
  token?: string
}

/**
 * Base error for all pattern graph errors.
 */
export class PatternGraphError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'PatternGraphError'
    this.cause = cause

    // V8-specific; omits the constructor frame
    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * Invalid argument error.
 * Thrown when required input is absent or empty, when configuration fails validation,
 * or when an event stream is structurally unbalanced.
 */
export class InvalidArgumentError extends PatternGraphError {
  constructor(
    message: string,
    public readonly argument?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = 'InvalidArgumentError'
  }
}

/**
 * Script syntax error.
 * Raised by the text front end; the loader never sees the malformed fragment.
 */
export class ScriptSyntaxError extends PatternGraphError {
  constructor(public readonly issues: SyntaxIssue[]) {
    super(ScriptSyntaxError.describe(issues))
    this.name = 'ScriptSyntaxError'
  }

  private static describe(issues: SyntaxIssue[]): string {
    const [first] = issues
    if (!first) return 'Syntax error'
    const position = first.line !== undefined ? ` at ${first.line}:${first.column ?? 0}` : ''
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : ''
    return `Syntax error${position}: ${first.message}${more}`
  }
}

/**
 * Semantic conflict error.
 * Thrown when a variable is reused across entity kinds or redeclared with
 * contradicting structure (label, property value, endpoints, id).
 */
export class SemanticConflictError extends PatternGraphError {
  constructor(
    message: string,
    public readonly variable?: string,
  ) {
    super(message)
    this.name = 'SemanticConflictError'
  }
}

/**
 * Dangling reference error.
 * Thrown when an edge endpoint never resolves to a declared vertex.
 */
export class DanglingReferenceError extends PatternGraphError {
  constructor(
    public readonly edge: string,
    public readonly endpoint: 'source' | 'target',
    public readonly reference?: string,
  ) {
    const details = reference !== undefined ? ` '${reference}'` : ''
    super(`Edge '${edge}' has a dangling ${endpoint} vertex${details}`)
    this.name = 'DanglingReferenceError'
  }
}
