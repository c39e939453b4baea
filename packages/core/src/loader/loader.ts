/**
 * Pattern Graph Loader
 *
 * Consumes syntax events in document order and builds graphs, vertices, edges
 * and the accumulated filter predicate. State carries over between appended
 * fragments: ids, variable bindings and predicates accumulate.
 *
 * @example
 * ```typescript
 * const loader = new Loader({ defaultVertexLabel: 'Node' })
 * loader.append([
 *   { type: 'vertex', variable: 'alice', label: 'Person' },
 *   { type: 'edge', label: 'knows' },
 *   { type: 'vertex', variable: 'bob' },
 * ])
 * loader.vertices() // alice:Person, bob:Node
 * loader.edges() // alice -knows-> bob
 * ```
 */

import { VariableCache, type Resolution } from '../cache'
import {
  DanglingReferenceError,
  InvalidArgumentError,
  SemanticConflictError,
} from '../errors'
import { IdSequence } from '../ids'
import type {
  Edge,
  EdgeBounds,
  Element,
  EntityKind,
  Graph,
  PropertyValue,
  Vertex,
} from '../model'
import {
  LABEL_KEY,
  combine,
  comparison,
  formatPredicate,
  literal,
  property,
  toCnf,
  type Predicate,
} from '../predicate'
import type { Logger } from '../utils/logger'
import {
  defaultLabelFor,
  resolveLoaderConfig,
  type LoaderConfig,
  type ResolvedLoaderConfig,
} from './config'
import {
  parseEvents,
  type EdgeEvent,
  type GraphStartEvent,
  type SyntaxEvent,
  type VertexEvent,
} from './events'

// =============================================================================
// INTERNAL RECORDS
// =============================================================================

const ENTITY_KINDS: readonly EntityKind[] = ['graph', 'vertex', 'edge']

const PLURALS: Record<EntityKind, string> = { graph: 'graphs', vertex: 'vertices', edge: 'edges' }

interface ElementRecord {
  id: number
  variable: string
  label?: string
  /** Whether `label` came from the configured default */
  labelIsDefault: boolean
  properties: Map<string, PropertyValue>
}

interface GraphRecord extends ElementRecord {
  vertexIds: Set<number>
  edgeIds: Set<number>
}

type EndpointSlot = 'source' | 'target'

/**
 * A vertex id known at declaration time, or a vertex variable resolved on read.
 */
type Endpoint = { kind: 'vertex'; id: number } | { kind: 'variable'; name: string }

interface EdgeRecord extends ElementRecord {
  source?: Endpoint
  target?: Endpoint
  bounds?: EdgeBounds
}

/**
 * An edge endpoint filled by the next vertex declaration.
 */
interface PendingEndpoint {
  edge: EdgeRecord
  slot: EndpointSlot
  isNew: boolean
}

interface CurrentElement {
  kind: EntityKind
  record: ElementRecord
}

// =============================================================================
// LOADER
// =============================================================================

export class Loader {
  private readonly config: ResolvedLoaderConfig
  private readonly logger: Logger

  private readonly graphRecords = new Map<number, GraphRecord>()
  private readonly vertexRecords = new Map<number, ElementRecord>()
  private readonly edgeRecords = new Map<number, EdgeRecord>()

  private readonly sequences: Record<EntityKind, IdSequence>
  private readonly caches: Record<EntityKind, VariableCache>

  private predicate: Predicate | undefined

  /** Graph scopes currently open, outermost first */
  private readonly openGraphs: GraphRecord[] = []
  private queryDepth = 0

  private lastVertexId: number | undefined
  private pendingEndpoint: PendingEndpoint | undefined
  private current: CurrentElement | undefined

  constructor(config: LoaderConfig = {}) {
    this.config = resolveLoaderConfig(config)
    this.logger = this.config.logger.child({ component: 'Loader' })
    this.sequences = {
      graph: new IdSequence(this.config.nextGraphId, 'graph'),
      vertex: new IdSequence(this.config.nextVertexId, 'vertex'),
      edge: new IdSequence(this.config.nextEdgeId, 'edge'),
    }
    const takenElsewhere = (kind: EntityKind) => (name: string) => this.isBoundElsewhere(kind, name)
    this.caches = {
      graph: new VariableCache('graph', this.sequences.graph, takenElsewhere('graph')),
      vertex: new VariableCache('vertex', this.sequences.vertex, takenElsewhere('vertex')),
      edge: new VariableCache('edge', this.sequences.edge, takenElsewhere('edge')),
    }
  }

  // ===========================================================================
  // LOADING
  // ===========================================================================

  /**
   * Validate and load one fragment of events.
   * @throws InvalidArgumentError if an event is malformed or scopes are unbalanced
   * @throws SemanticConflictError on contradicting declarations
   * @throws DanglingReferenceError if an edge lacks its preceding or following vertex
   */
  append(events: readonly SyntaxEvent[]): void {
    if (!Array.isArray(events)) {
      throw new InvalidArgumentError('Events must be an array', 'events')
    }
    const fragment = parseEvents(events)
    this.logger.debug({ events: fragment.length }, 'Appending fragment')

    for (const event of fragment) {
      this.process(event)
    }
    this.completeFragment()

    if (this.predicate !== undefined) {
      this.logger.debug({ predicate: formatPredicate(toCnf(this.predicate)) }, 'Predicate updated')
    }
  }

  /**
   * Handle a single event. Callers feeding events one by one finish each
   * fragment with `completeFragment()`.
   */
  process(event: SyntaxEvent): void {
    if (this.pendingEndpoint && !isEndpointFiller(event)) {
      throw this.danglingPending(this.pendingEndpoint)
    }

    switch (event.type) {
      case 'graphStart':
        this.startGraph(event)
        return
      case 'graphEnd':
        this.endGraph()
        return
      case 'queryStart':
        this.queryDepth++
        this.resetPosition()
        return
      case 'queryEnd':
        if (this.queryDepth === 0) {
          throw new InvalidArgumentError('queryEnd without a matching queryStart', 'events')
        }
        this.queryDepth--
        this.resetPosition()
        return
      case 'vertex':
        this.declareVertex(event)
        return
      case 'edge':
        this.declareEdge(event)
        return
      case 'label':
        this.applyLabel(this.requireCurrent('label'), event.label, false)
        return
      case 'property': {
        const current = this.requireCurrent('property')
        this.applyProperty(current, event.key, event.value)
        return
      }
      case 'predicate':
        this.constrain(event.predicate)
        this.resetPosition()
        return
    }
  }

  /**
   * Close the current fragment.
   * @throws DanglingReferenceError if an edge still waits for its following vertex
   * @throws InvalidArgumentError if a graph or query scope is still open
   */
  completeFragment(): void {
    if (this.pendingEndpoint) {
      throw this.danglingPending(this.pendingEndpoint)
    }
    const unclosed = this.openGraphs[this.openGraphs.length - 1]
    if (unclosed) {
      throw new InvalidArgumentError(`Graph '${unclosed.variable}' is not closed`, 'events')
    }
    if (this.queryDepth > 0) {
      throw new InvalidArgumentError('Query scope is not closed', 'events')
    }
    this.resetPosition()
  }

  // ===========================================================================
  // READ ACCESSORS
  // ===========================================================================

  graphs(): Graph[] {
    return Array.from(this.graphRecords.values(), (record) => this.toGraph(record))
  }

  vertices(): Vertex[] {
    return Array.from(this.vertexRecords.values(), (record) => this.toVertex(record))
  }

  /**
   * @throws DanglingReferenceError if an endpoint variable was never declared as a vertex
   */
  edges(): Edge[] {
    return Array.from(this.edgeRecords.values(), (record) => this.toEdge(record))
  }

  /**
   * The conjunction of all filters declared so far, in conjunctive normal form.
   */
  predicates(): Predicate | undefined {
    return this.predicate === undefined ? undefined : toCnf(this.predicate)
  }

  getGraphCache(includeUserDefined = true, includeAutoGenerated = false): Map<string, Graph> {
    return this.snapshotCache('graph', includeUserDefined, includeAutoGenerated, (id) =>
      this.toGraph(this.requireRecord(this.graphRecords, id)),
    )
  }

  getVertexCache(includeUserDefined = true, includeAutoGenerated = false): Map<string, Vertex> {
    return this.snapshotCache('vertex', includeUserDefined, includeAutoGenerated, (id) =>
      this.toVertex(this.requireRecord(this.vertexRecords, id)),
    )
  }

  /**
   * @throws DanglingReferenceError if an endpoint variable was never declared as a vertex
   */
  getEdgeCache(includeUserDefined = true, includeAutoGenerated = false): Map<string, Edge> {
    return this.snapshotCache('edge', includeUserDefined, includeAutoGenerated, (id) =>
      this.toEdge(this.requireRecord(this.edgeRecords, id)),
    )
  }

  // ===========================================================================
  // DECLARATIONS
  // ===========================================================================

  private startGraph(event: GraphStartEvent): void {
    const resolution = this.resolve('graph', event.variable, event.id)
    const record = resolution.isNew
      ? this.createGraph(resolution)
      : this.requireRecord(this.graphRecords, resolution.id)
    const current: CurrentElement = { kind: 'graph', record }

    this.applyLabel(current, event.label, resolution.isNew)
    this.applyProperties(current, event.properties)

    this.openGraphs.push(record)
    this.resetPosition()
    this.current = current
  }

  private endGraph(): void {
    if (!this.openGraphs.pop()) {
      throw new InvalidArgumentError('graphEnd without a matching graphStart', 'events')
    }
    this.resetPosition()
  }

  private declareVertex(event: VertexEvent): void {
    const resolution = this.resolve('vertex', event.variable)
    const record = resolution.isNew
      ? this.createVertex(resolution)
      : this.requireRecord(this.vertexRecords, resolution.id)
    const current: CurrentElement = { kind: 'vertex', record }

    this.applyLabel(current, event.label, resolution.isNew)
    this.applyProperties(current, event.properties)

    for (const graph of this.openGraphs) {
      graph.vertexIds.add(record.id)
    }

    if (this.pendingEndpoint) {
      const { edge, slot, isNew } = this.pendingEndpoint
      this.pendingEndpoint = undefined
      this.setEndpoint(edge, slot, { kind: 'vertex', id: record.id }, isNew)
    }

    this.lastVertexId = record.id
    this.current = current
  }

  private declareEdge(event: EdgeEvent): void {
    const resolution = this.resolve('edge', event.variable)
    const record = resolution.isNew
      ? this.createEdge(resolution)
      : this.requireRecord(this.edgeRecords, resolution.id)
    const current: CurrentElement = { kind: 'edge', record }

    this.applyLabel(current, event.label, resolution.isNew)
    this.applyProperties(current, event.properties)

    // 'out': previous vertex is the source; 'in': previous vertex is the target
    const previousSlot: EndpointSlot = event.direction === 'in' ? 'target' : 'source'
    let pending: PendingEndpoint | undefined

    for (const slot of ['source', 'target'] as const) {
      const name = slot === 'source' ? event.source : event.target
      if (name !== undefined) {
        this.assertUnboundElsewhere('vertex', name)
        this.setEndpoint(record, slot, { kind: 'variable', name }, resolution.isNew)
      } else if (slot === previousSlot) {
        if (this.lastVertexId === undefined) {
          throw new DanglingReferenceError(record.variable, slot)
        }
        this.setEndpoint(record, slot, { kind: 'vertex', id: this.lastVertexId }, resolution.isNew)
      } else {
        pending = { edge: record, slot, isNew: resolution.isNew }
      }
    }

    if (event.bounds) {
      this.applyBounds(record, event.bounds)
    }

    for (const graph of this.openGraphs) {
      graph.edgeIds.add(record.id)
    }

    this.pendingEndpoint = pending
    this.current = current
  }

  // ===========================================================================
  // VARIABLES & RECORDS
  // ===========================================================================

  private resolve(kind: EntityKind, name: string | undefined, presetId?: number): Resolution {
    const cache = this.caches[kind]
    if (name !== undefined) {
      this.assertUnboundElsewhere(kind, name)
    }
    if (presetId === undefined) {
      return cache.resolveOrCreate(name)
    }

    const bound = name !== undefined ? cache.lookup(name) : undefined
    if (bound !== undefined) {
      if (bound !== presetId) {
        throw new SemanticConflictError(
          `${capitalize(kind)} '${name}' has id ${bound} and cannot be redeclared with id ${presetId}`,
          name,
        )
      }
      return cache.resolveOrCreate(name)
    }
    if (!this.sequences[kind].claim(presetId)) {
      throw new SemanticConflictError(`${capitalize(kind)} id ${presetId} is already in use`, name)
    }
    return cache.resolveOrCreate(name, presetId)
  }

  /**
   * A variable belongs to exactly one entity kind.
   */
  private assertUnboundElsewhere(kind: EntityKind, name: string): void {
    const other = this.kindBinding(kind, name)
    if (other !== undefined) {
      throw new SemanticConflictError(
        `Variable '${name}' is bound in the ${other} namespace and cannot be used for ${PLURALS[kind]}`,
        name,
      )
    }
  }

  private isBoundElsewhere(kind: EntityKind, name: string): boolean {
    return this.kindBinding(kind, name) !== undefined
  }

  /** The other entity kind `name` is bound to, if any */
  private kindBinding(kind: EntityKind, name: string): EntityKind | undefined {
    return ENTITY_KINDS.find((other) => other !== kind && this.caches[other].has(name))
  }

  private createGraph(resolution: Resolution): GraphRecord {
    const record: GraphRecord = {
      ...this.newElement(resolution),
      vertexIds: new Set(),
      edgeIds: new Set(),
    }
    this.graphRecords.set(record.id, record)
    this.logger.trace({ id: record.id, variable: record.variable }, 'Created graph')
    return record
  }

  private createVertex(resolution: Resolution): ElementRecord {
    const record = this.newElement(resolution)
    this.vertexRecords.set(record.id, record)
    this.logger.trace({ id: record.id, variable: record.variable }, 'Created vertex')
    return record
  }

  private createEdge(resolution: Resolution): EdgeRecord {
    const record: EdgeRecord = this.newElement(resolution)
    this.edgeRecords.set(record.id, record)
    this.logger.trace({ id: record.id, variable: record.variable }, 'Created edge')
    return record
  }

  private newElement(resolution: Resolution): ElementRecord {
    return {
      id: resolution.id,
      variable: resolution.variable,
      labelIsDefault: false,
      properties: new Map(),
    }
  }

  private requireRecord<R>(records: Map<number, R>, id: number): R {
    const record = records.get(id)
    if (record === undefined) {
      throw new InvalidArgumentError(`No entity with id ${id}`, 'id')
    }
    return record
  }

  private requireCurrent(eventType: string): CurrentElement {
    if (!this.current) {
      throw new InvalidArgumentError(`A ${eventType} event needs a preceding declaration`, 'events')
    }
    return this.current
  }

  private resetPosition(): void {
    this.lastVertexId = undefined
    this.current = undefined
  }

  // ===========================================================================
  // LABELS, PROPERTIES, ENDPOINTS
  // ===========================================================================

  /**
   * New entities take the declared label, else the configured default.
   * A re-reference may replace a default label but not an explicit one.
   */
  private applyLabel({ kind, record }: CurrentElement, declared: string | undefined, isNew: boolean): void {
    if (declared === undefined) {
      const fallback = isNew ? defaultLabelFor(this.config, kind) : undefined
      if (fallback !== undefined) {
        record.label = fallback
        record.labelIsDefault = true
      }
      return
    }

    if (record.label !== undefined && !record.labelIsDefault && record.label !== declared) {
      throw new SemanticConflictError(
        `${capitalize(kind)} '${record.variable}' is labeled '${record.label}' and cannot be relabeled '${declared}'`,
        record.variable,
      )
    }
    record.label = declared
    record.labelIsDefault = false

    if (this.queryDepth > 0) {
      this.constrainProperty(record.variable, LABEL_KEY, declared)
    }
  }

  private applyProperties(current: CurrentElement, properties: Record<string, PropertyValue> | undefined): void {
    if (!properties) return
    for (const [key, value] of Object.entries(properties)) {
      this.applyProperty(current, key, value)
    }
  }

  private applyProperty({ kind, record }: CurrentElement, key: string, value: PropertyValue): void {
    const existing = record.properties.get(key)
    if (existing !== undefined && existing !== value) {
      throw new SemanticConflictError(
        `${capitalize(kind)} '${record.variable}' has ${key} = ${String(existing)} and cannot be redeclared with ${String(value)}`,
        record.variable,
      )
    }
    record.properties.set(key, value)

    if (this.queryDepth > 0) {
      this.constrainProperty(record.variable, key, value)
    }
  }

  private applyBounds(record: EdgeRecord, bounds: EdgeBounds): void {
    const existing = record.bounds
    if (existing && (existing.lower !== bounds.lower || existing.upper !== bounds.upper)) {
      throw new SemanticConflictError(`Edge '${record.variable}' is redeclared with different bounds`, record.variable)
    }
    record.bounds = bounds.upper === undefined ? { lower: bounds.lower } : { lower: bounds.lower, upper: bounds.upper }
  }

  private setEndpoint(record: EdgeRecord, slot: EndpointSlot, endpoint: Endpoint, isNew: boolean): void {
    const existing = record[slot]
    if (isNew || existing === undefined) {
      record[slot] = endpoint
      return
    }
    if (!this.sameEndpoint(existing, endpoint)) {
      throw new SemanticConflictError(
        `Edge '${record.variable}' is redeclared with a different ${slot} vertex`,
        record.variable,
      )
    }
  }

  private sameEndpoint(a: Endpoint, b: Endpoint): boolean {
    const idA = this.endpointId(a)
    const idB = this.endpointId(b)
    if (idA !== undefined || idB !== undefined) return idA === idB
    // both are still unresolved variables
    return a.kind === 'variable' && b.kind === 'variable' && a.name === b.name
  }

  private endpointId(endpoint: Endpoint): number | undefined {
    return endpoint.kind === 'vertex' ? endpoint.id : this.caches.vertex.lookup(endpoint.name)
  }

  private danglingPending({ edge, slot }: PendingEndpoint): DanglingReferenceError {
    return new DanglingReferenceError(edge.variable, slot)
  }

  // ===========================================================================
  // PREDICATES
  // ===========================================================================

  private constrain(predicate: Predicate): void {
    this.predicate = combine(this.predicate, predicate)
  }

  private constrainProperty(variable: string, key: string, value: PropertyValue): void {
    this.constrain(comparison(property(variable, key), 'eq', literal(value)))
  }

  // ===========================================================================
  // SNAPSHOTS
  // ===========================================================================

  private snapshotCache<T>(
    kind: EntityKind,
    includeUserDefined: boolean,
    includeAutoGenerated: boolean,
    toEntity: (id: number) => T,
  ): Map<string, T> {
    const result = new Map<string, T>()
    for (const [name, id] of this.caches[kind].getCache(includeUserDefined, includeAutoGenerated)) {
      result.set(name, toEntity(id))
    }
    return result
  }

  private toElement(record: ElementRecord): Element {
    const properties = Object.freeze(Object.fromEntries(record.properties))
    return record.label === undefined
      ? { id: record.id, properties }
      : { id: record.id, label: record.label, properties }
  }

  private toGraph(record: GraphRecord): Graph {
    return Object.freeze({
      ...this.toElement(record),
      vertexIds: new Set(record.vertexIds),
      edgeIds: new Set(record.edgeIds),
    })
  }

  private toVertex(record: ElementRecord): Vertex {
    return Object.freeze(this.toElement(record))
  }

  private toEdge(record: EdgeRecord): Edge {
    const edge: Edge = {
      ...this.toElement(record),
      sourceVertexId: this.resolveEndpoint(record, 'source'),
      targetVertexId: this.resolveEndpoint(record, 'target'),
      ...(record.bounds ? { bounds: Object.freeze({ ...record.bounds }) } : {}),
    }
    return Object.freeze(edge)
  }

  private resolveEndpoint(record: EdgeRecord, slot: EndpointSlot): number {
    const endpoint = record[slot]
    if (endpoint === undefined) {
      throw new DanglingReferenceError(record.variable, slot)
    }
    const id = this.endpointId(endpoint)
    if (id === undefined) {
      throw new DanglingReferenceError(
        record.variable,
        slot,
        endpoint.kind === 'variable' ? endpoint.name : undefined,
      )
    }
    return id
  }
}

/**
 * Events that may follow an edge still waiting for its target vertex.
 */
function isEndpointFiller(event: SyntaxEvent): boolean {
  return event.type === 'vertex' || event.type === 'label' || event.type === 'property'
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1)
}
