/**
 * Identifier Generation
 *
 * Graphs, vertices and edges each draw ids from their own sequence.
 */

import { InvalidArgumentError } from '../errors'

/**
 * Produces the next identifier of one namespace.
 * Successive calls must return distinct values.
 */
export type IdGenerator = () => number

/**
 * Default generator: `start`, `start + 1`, `start + 2`, ...
 */
export function continuousId(start = 0): IdGenerator {
  let next = start
  return () => next++
}

/**
 * Id source for one entity kind.
 *
 * Wraps a pluggable generator and guarantees that no id is handed out twice,
 * including ids claimed explicitly through `claim()`.
 */
export class IdSequence {
  private readonly issued = new Set<number>()
  private readonly claimed = new Set<number>()

  constructor(
    private readonly generator: IdGenerator,
    readonly namespace: string,
  ) {}

  /**
   * Issue the next free id. Ids claimed earlier are skipped.
   * @throws InvalidArgumentError if the generator repeats an issued id or returns a non-integer
   */
  next(): number {
    // a generator can land on every claimed id once before producing a fresh one
    for (let attempt = 0; attempt <= this.claimed.size; attempt++) {
      const id = this.generator()
      if (!Number.isSafeInteger(id)) {
        throw new InvalidArgumentError(
          `Id generator for ${this.namespace} returned a non-integer id: ${String(id)}`,
          this.namespace,
        )
      }
      if (this.issued.has(id)) {
        throw new InvalidArgumentError(
          `Id generator for ${this.namespace} returned id ${id} twice`,
          this.namespace,
        )
      }
      if (!this.claimed.has(id)) {
        this.issued.add(id)
        return id
      }
    }
    throw new InvalidArgumentError(
      `Id generator for ${this.namespace} keeps returning claimed ids`,
      this.namespace,
    )
  }

  /**
   * Reserve an explicitly declared id.
   * @returns false if the id was already issued or claimed
   * @throws InvalidArgumentError if the id is not a safe integer
   */
  claim(id: number): boolean {
    if (!Number.isSafeInteger(id)) {
      throw new InvalidArgumentError(
        `Cannot claim non-integer id ${String(id)} for ${this.namespace}`,
        this.namespace,
      )
    }
    if (this.has(id)) return false
    this.claimed.add(id)
    return true
  }

  has(id: number): boolean {
    return this.issued.has(id) || this.claimed.has(id)
  }
}
