/**
 * Errors Module
 */

export {
  PatternGraphError,
  InvalidArgumentError,
  ScriptSyntaxError,
  SemanticConflictError,
  DanglingReferenceError,
} from './errors'
export type { SyntaxIssue } from './errors'
