/**
 * Predicate Formatting
 *
 * Renders predicate trees as text for logs and error messages.
 */

import type { ComparisonOperator, LiteralValue, Operand, Predicate } from './types'

const OPERATOR_SYMBOLS: Record<ComparisonOperator, string> = {
  eq: '=',
  neq: '<>',
  lt: '<',
  lte: '<=',
  gt: '>',
  gte: '>=',
}

export function formatOperator(operator: ComparisonOperator): string {
  return OPERATOR_SYMBOLS[operator]
}

function formatLiteral(value: LiteralValue): string {
  if (value === null) return 'NULL'
  if (typeof value === 'string') return JSON.stringify(value)
  return String(value)
}

function formatOperand(operand: Operand): string {
  switch (operand.type) {
    case 'literal':
      return formatLiteral(operand.value)
    case 'property':
      return `${operand.variable}.${operand.key}`
    case 'variable':
      return operand.variable
  }
}

/**
 * @example
 * ```typescript
 * formatPredicate(not(comparison(property('a', 'age'), 'gt', literal(10))))
 * // NOT a.age > 10
 * ```
 */
export function formatPredicate(predicate: Predicate): string {
  switch (predicate.type) {
    case 'comparison':
      return `${formatOperand(predicate.left)} ${formatOperator(predicate.operator)} ${formatOperand(predicate.right)}`
    case 'not':
      return `NOT ${formatPredicate(predicate.predicate)}`
    case 'and':
      if (predicate.predicates.length === 0) return 'TRUE'
      return `(${predicate.predicates.map(formatPredicate).join(' AND ')})`
    case 'or':
      if (predicate.predicates.length === 0) return 'FALSE'
      return `(${predicate.predicates.map(formatPredicate).join(' OR ')})`
  }
}
