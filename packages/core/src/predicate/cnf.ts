/**
 * Conjunctive Normal Form
 *
 * Rewrites a predicate tree into an AND of OR-clauses over (possibly negated)
 * comparisons. Clause and literal order follow the input, so repeated
 * normalization yields the same tree.
 *
 * An empty `and` is true and an empty `or` is false. The normal form of a
 * tautology is `and()`, the one of a contradiction is `or()`.
 *
 * Distribution of OR over AND multiplies clauses; pathological inputs grow
 * exponentially.
 */

import type { Comparison, Predicate, PredicateLiteral } from './types'
import { and, or } from './builders'

type Clause = PredicateLiteral[]

/**
 * Normalize `predicate` into conjunctive normal form.
 *
 * The result is a single literal, a single `or` clause, or an `and` whose
 * children are literals and `or` clauses.
 */
export function toCnf(predicate: Predicate): Predicate {
  const clauses = clausesOf(predicate, false).map(toClausePredicate)
  const [only] = clauses
  return clauses.length === 1 && only !== undefined ? only : and(...clauses)
}

/**
 * Whether `predicate` already has the shape produced by `toCnf`.
 */
export function isCnf(predicate: Predicate): boolean {
  if (predicate.type === 'and') {
    return predicate.predicates.length !== 1 && predicate.predicates.every(isClause)
  }
  return isClause(predicate)
}

function isClause(predicate: Predicate): boolean {
  if (predicate.type === 'or') {
    return predicate.predicates.length !== 1 && predicate.predicates.every(isLiteral)
  }
  return isLiteral(predicate)
}

function isLiteral(predicate: Predicate): predicate is PredicateLiteral {
  return (
    predicate.type === 'comparison' ||
    (predicate.type === 'not' && predicate.predicate.type === 'comparison')
  )
}

function toClausePredicate(clause: Clause): Predicate {
  const [only] = clause
  return clause.length === 1 && only !== undefined ? only : or(...clause)
}

/**
 * Clause list of `predicate`, or of its negation when `negated` is set.
 * `[]` is true; a list holding the empty clause is false.
 */
function clausesOf(predicate: Predicate, negated: boolean): Clause[] {
  switch (predicate.type) {
    case 'comparison':
      return [[negated ? negatedLiteral(predicate) : predicate]]
    case 'not':
      return clausesOf(predicate.predicate, !negated)
    case 'and':
      // NOT (a AND b) = NOT a OR NOT b
      return negated ? disjoin(predicate.predicates, true) : conjoin(predicate.predicates, false)
    case 'or':
      // NOT (a OR b) = NOT a AND NOT b
      return negated ? conjoin(predicate.predicates, true) : disjoin(predicate.predicates, false)
  }
}

function negatedLiteral(comparison: Comparison): PredicateLiteral {
  return { type: 'not', predicate: comparison }
}

function conjoin(predicates: Predicate[], negated: boolean): Clause[] {
  const clauses = predicates.flatMap((p) => clausesOf(p, negated))
  return clauses.some((clause) => clause.length === 0) ? [[]] : clauses
}

/**
 * Distribute a disjunction: every combination of one clause per operand
 * becomes one clause of the result.
 */
function disjoin(predicates: Predicate[], negated: boolean): Clause[] {
  let result: Clause[] = [[]]
  for (const p of predicates) {
    const operandClauses = clausesOf(p, negated)
    const next: Clause[] = []
    for (const prefix of result) {
      for (const clause of operandClauses) {
        next.push([...prefix, ...clause])
      }
    }
    result = next
  }
  return result
}
