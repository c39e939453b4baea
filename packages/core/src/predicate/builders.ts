/**
 * Predicate Builder Functions
 */

import type {
  And,
  Comparison,
  ComparisonOperator,
  LiteralOperand,
  LiteralValue,
  Not,
  Operand,
  Or,
  Predicate,
  PropertyOperand,
  VariableOperand,
} from './types'

export function literal(value: LiteralValue): LiteralOperand {
  return { type: 'literal', value }
}

export function property(variable: string, key: string): PropertyOperand {
  return { type: 'property', variable, key }
}

export function variable(name: string): VariableOperand {
  return { type: 'variable', variable: name }
}

export function comparison(left: Operand, operator: ComparisonOperator, right: Operand): Comparison {
  return { type: 'comparison', left, operator, right }
}

export function and(...predicates: Predicate[]): And {
  return { type: 'and', predicates }
}

export function or(...predicates: Predicate[]): Or {
  return { type: 'or', predicates }
}

export function not(predicate: Predicate): Not {
  return { type: 'not', predicate }
}

/**
 * Conjoin two optional predicates.
 *
 * Used to accumulate filters within one pattern and across appended fragments.
 */
export function combine(existing: Predicate | undefined, next: Predicate | undefined): Predicate | undefined {
  if (existing === undefined) return next
  if (next === undefined) return existing
  return and(existing, next)
}
