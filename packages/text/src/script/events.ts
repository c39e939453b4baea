/**
 * Parse tree → syntax events, in document order.
 */

import type { EdgeEvent, SyntaxEvent, VertexEvent } from "@patterngraph/core"
import type { DefinitionNode, EdgeNode, GraphNode, HeaderNode, PathNode, QueryNode, ScriptNode } from "../grammar/types"

export function toEvents(script: ScriptNode): SyntaxEvent[] {
  const events: SyntaxEvent[] = []
  for (const definition of script.definitions) {
    emitDefinition(definition, events)
  }
  return events
}

function emitDefinition(definition: DefinitionNode, events: SyntaxEvent[]): void {
  switch (definition.type) {
    case "path":
      emitPath(definition, events)
      return
    case "graph":
      emitGraph(definition, events)
      return
    case "query":
      emitQuery(definition, events)
      return
  }
}

function emitQuery(query: QueryNode, events: SyntaxEvent[]): void {
  events.push({ type: "queryStart" })
  for (const pattern of query.patterns) {
    if (pattern.type === "graph") {
      emitGraph(pattern, events)
    } else {
      emitPath(pattern, events)
    }
  }
  if (query.where) {
    events.push({ type: "predicate", predicate: query.where })
  }
  events.push({ type: "queryEnd" })
}

function emitGraph(graph: GraphNode, events: SyntaxEvent[]): void {
  events.push({ type: "graphStart", ...declaration(graph) })
  for (const path of graph.paths) {
    emitPath(path, events)
  }
  events.push({ type: "graphEnd" })
}

function emitPath(path: PathNode, events: SyntaxEvent[]): void {
  events.push(vertexEvent(path.start))
  for (const hop of path.hops) {
    events.push(edgeEvent(hop.edge))
    events.push(vertexEvent(hop.vertex))
  }
}

function vertexEvent(vertex: HeaderNode): VertexEvent {
  return { type: "vertex", ...declaration(vertex) }
}

function edgeEvent(edge: EdgeNode): EdgeEvent {
  const event: EdgeEvent = { type: "edge", ...declaration(edge), direction: edge.direction }
  if (edge.bounds) {
    event.bounds = edge.bounds
  }
  return event
}

/**
 * Declaration fields without the ones the script left out.
 */
function declaration(header: HeaderNode): Pick<VertexEvent, "variable" | "label" | "properties"> {
  const fields: Pick<VertexEvent, "variable" | "label" | "properties"> = {}
  if (header.variable !== undefined) fields.variable = header.variable
  if (header.label !== undefined) fields.label = header.label
  if (Object.keys(header.properties).length > 0) fields.properties = header.properties
  return fields
}
