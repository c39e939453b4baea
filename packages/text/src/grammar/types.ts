/**
 * Parse Tree Types
 *
 * What the grammar produces for one script, before it becomes syntax events.
 */

import type { EdgeBounds, Predicate, PropertyValue } from "@patterngraph/core"

export interface HeaderNode {
  variable?: string
  label?: string
  properties: Record<string, PropertyValue>
}

export type VertexNode = HeaderNode

export interface EdgeNode extends HeaderNode {
  direction: "out" | "in"
  bounds?: EdgeBounds
}

export interface HopNode {
  edge: EdgeNode
  vertex: VertexNode
}

/**
 * `(a)-[e]->(b)<-(c)`: a start vertex followed by edge/vertex hops.
 */
export interface PathNode {
  type: "path"
  start: VertexNode
  hops: HopNode[]
}

export interface GraphNode extends HeaderNode {
  type: "graph"
  paths: PathNode[]
}

export interface QueryNode {
  type: "query"
  patterns: Array<PathNode | GraphNode>
  where?: Predicate
}

export type DefinitionNode = PathNode | GraphNode | QueryNode

export interface ScriptNode {
  definitions: DefinitionNode[]
}
