/**
 * Predicate Module
 *
 * Filter expression trees and their conjunctive normal form.
 */

export { literal, property, variable, comparison, and, or, not, combine } from './builders'
export { toCnf, isCnf } from './cnf'
export { formatPredicate, formatOperator } from './format'
export { LABEL_KEY } from './types'
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
} from './types'
