/**
 * Variable Cache
 *
 * Bidirectional mapping between variable names and entity ids for one entity kind.
 * Names written in the script are user-defined; names synthesized for anonymous
 * elements are auto-generated. The two partitions never share a name.
 */

import { SemanticConflictError } from '../errors'
import type { IdSequence } from '../ids'
import type { EntityKind } from '../model'

const AUTO_PREFIX: Record<EntityKind, string> = {
  graph: '__g',
  vertex: '__v',
  edge: '__e',
}

/**
 * Outcome of resolving a variable.
 */
export interface Resolution {
  id: number
  /** The user-defined or synthesized variable name */
  variable: string
  /** Whether a new entity has to be created for this id */
  isNew: boolean
}

export class VariableCache {
  private readonly userDefined = new Map<string, number>()
  private readonly autoGenerated = new Map<string, number>()
  private readonly names = new Map<number, string>()
  private autoCounter = 0

  /**
   * @param isTakenElsewhere - names bound outside this cache, skipped when synthesizing
   */
  constructor(
    readonly kind: EntityKind,
    private readonly ids: IdSequence,
    private readonly isTakenElsewhere: (name: string) => boolean = () => false,
  ) {}

  /**
   * Look up `name`, binding it to a new id if it is unbound.
   * Without a name, a fresh auto-generated variable is bound.
   *
   * @param presetId - id to bind instead of drawing from the sequence; must already be claimed
   */
  resolveOrCreate(name?: string, presetId?: number): Resolution {
    if (name === undefined) {
      const variable = this.nextAutoName()
      const id = presetId ?? this.ids.next()
      this.bind(this.autoGenerated, variable, id)
      return { id, variable, isNew: true }
    }

    if (this.autoGenerated.has(name)) {
      throw new SemanticConflictError(
        `Variable '${name}' is reserved for an anonymous ${this.kind}`,
        name,
      )
    }

    const existing = this.userDefined.get(name)
    if (existing !== undefined) {
      return { id: existing, variable: name, isNew: false }
    }

    const id = presetId ?? this.ids.next()
    this.bind(this.userDefined, name, id)
    return { id, variable: name, isNew: true }
  }

  lookup(name: string): number | undefined {
    return this.userDefined.get(name) ?? this.autoGenerated.get(name)
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined
  }

  isAutoGenerated(name: string): boolean {
    return this.autoGenerated.has(name)
  }

  /** Variable bound to `id`, if any */
  nameOf(id: number): string | undefined {
    return this.names.get(id)
  }

  /**
   * Snapshot of the bindings, filtered by partition.
   */
  getCache(includeUserDefined = true, includeAutoGenerated = false): Map<string, number> {
    const result = new Map<string, number>()
    if (includeUserDefined) {
      for (const [name, id] of this.userDefined) result.set(name, id)
    }
    if (includeAutoGenerated) {
      for (const [name, id] of this.autoGenerated) result.set(name, id)
    }
    return result
  }

  private bind(partition: Map<string, number>, name: string, id: number): void {
    partition.set(name, id)
    this.names.set(id, name)
  }

  private nextAutoName(): string {
    let name = `${AUTO_PREFIX[this.kind]}${this.autoCounter++}`
    while (this.userDefined.has(name) || this.isTakenElsewhere(name)) {
      name = `${AUTO_PREFIX[this.kind]}${this.autoCounter++}`
    }
    return name
  }
}
