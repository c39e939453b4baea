/**
 * Syntax Error Strategies
 *
 * Decide what happens to a script fragment the lexer or parser rejected.
 * A strategy either throws or returns; when it returns, the fragment is
 * dropped and nothing reaches the loader.
 */

import { ScriptSyntaxError, type Logger, type SyntaxIssue } from "@patterngraph/core"

export interface SyntaxErrorStrategy {
  readonly name: string
  handle(issues: SyntaxIssue[], source: string): void
}

/**
 * Throw on the first issue. The default.
 */
export const failFast: SyntaxErrorStrategy = {
  name: "failFast",
  handle(issues) {
    throw new ScriptSyntaxError(issues.slice(0, 1))
  },
}

/**
 * Throw one error carrying every issue.
 */
export const reportAll: SyntaxErrorStrategy = {
  name: "reportAll",
  handle(issues) {
    throw new ScriptSyntaxError(issues)
  },
}

/**
 * Log the issues and skip the fragment.
 */
export function skipInvalid(logger: Logger): SyntaxErrorStrategy {
  const log = logger.child({ component: "SyntaxErrorStrategy" })
  return {
    name: "skipInvalid",
    handle(issues, source) {
      log.warn({ issues, length: source.length }, "Skipping script fragment with syntax errors")
    },
  }
}
