/**
 * Entity Model
 *
 * Read-only records handed out by the loader. Entities reference each other
 * by id only.
 */

// =============================================================================
// PROPERTIES
// =============================================================================

export type PropertyValue = string | number | boolean

export type Properties = Readonly<Record<string, PropertyValue>>

export type EntityKind = 'graph' | 'vertex' | 'edge'

// =============================================================================
// ENTITIES
// =============================================================================

/**
 * Fields shared by graphs, vertices and edges.
 */
export interface Element {
  readonly id: number
  /** Absent when no label was declared and defaulting is disabled */
  readonly label?: string
  readonly properties: Properties
}

export interface Graph extends Element {
  readonly vertexIds: ReadonlySet<number>
  readonly edgeIds: ReadonlySet<number>
}

export type Vertex = Element

/**
 * Declared variable-length bound of an edge pattern, e.g. `*1..3`.
 */
export interface EdgeBounds {
  readonly lower: number
  /** Absent means unbounded */
  readonly upper?: number
}

export interface Edge extends Element {
  readonly sourceVertexId: number
  readonly targetVertexId: number
  readonly bounds?: EdgeBounds
}

