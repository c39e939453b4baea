/**
 * Predicate Tree Type Definitions
 *
 * Boolean filter expressions over variables, property lookups and literals.
 */

import type { PropertyValue } from '../model'

// =============================================================================
// COMPARISON OPERATORS
// =============================================================================

export type ComparisonOperator =
  | 'eq' // =
  | 'neq' // <>
  | 'lt' // <
  | 'lte' // <=
  | 'gt' // >
  | 'gte' // >=

// =============================================================================
// OPERANDS
// =============================================================================

export type LiteralValue = PropertyValue | null

export interface LiteralOperand {
  type: 'literal'
  value: LiteralValue
}

/**
 * Property lookup, e.g. `alice.age`.
 */
export interface PropertyOperand {
  type: 'property'
  variable: string
  key: string
}

/**
 * Reference to a whole element, e.g. `a` in `a <> b`.
 */
export interface VariableOperand {
  type: 'variable'
  variable: string
}

export type Operand = LiteralOperand | PropertyOperand | VariableOperand

// =============================================================================
// PREDICATES
// =============================================================================

export interface Comparison {
  type: 'comparison'
  left: Operand
  operator: ComparisonOperator
  right: Operand
}

export interface And {
  type: 'and'
  predicates: Predicate[]
}

export interface Or {
  type: 'or'
  predicates: Predicate[]
}

export interface Not {
  type: 'not'
  predicate: Predicate
}

export type Predicate = Comparison | And | Or | Not

/**
 * A CNF literal: a comparison or a negated comparison.
 */
export type PredicateLiteral = Comparison | (Not & { predicate: Comparison })

/** Property key used for label constraints in query scope */
export const LABEL_KEY = '__label__'
