/**
 * Syntax Events
 *
 * The ordered declarations a front end feeds into the loader. Every event is
 * handled completely before the next one.
 */

import { z } from 'zod'
import { InvalidArgumentError } from '../errors'
import type { EdgeBounds, PropertyValue } from '../model'
import type { Predicate } from '../predicate'

// =============================================================================
// EVENT TYPES
// =============================================================================

/**
 * Fields shared by graph, vertex and edge declarations.
 */
interface DeclarationFields {
  /** Variable written in the script; absent for anonymous elements */
  variable?: string
  label?: string
  properties?: Record<string, PropertyValue>
}

/**
 * Opens a graph scope. Vertices and edges declared until the matching
 * `graphEnd` become members of the graph.
 */
export interface GraphStartEvent extends DeclarationFields {
  type: 'graphStart'
  /** Literal id; overrides the id generator */
  id?: number
}

export interface GraphEndEvent {
  type: 'graphEnd'
}

/**
 * Opens a query (MATCH) scope: labels and properties declared inside become
 * equality constraints in the predicate.
 */
export interface QueryStartEvent {
  type: 'queryStart'
}

export interface QueryEndEvent {
  type: 'queryEnd'
}

export interface VertexEvent extends DeclarationFields {
  type: 'vertex'
}

/**
 * Declares an edge.
 *
 * `source` / `target` name vertex variables. An omitted endpoint refers to the
 * vertex declared right before the edge (source for 'out', target for 'in') or
 * right after it (target for 'out', source for 'in').
 */
export interface EdgeEvent extends DeclarationFields {
  type: 'edge'
  direction?: 'out' | 'in'
  source?: string
  target?: string
  bounds?: EdgeBounds
}

/**
 * Assigns a property to the element declared last.
 */
export interface PropertyEvent {
  type: 'property'
  key: string
  value: PropertyValue
}

/**
 * Assigns a label to the element declared last.
 */
export interface LabelEvent {
  type: 'label'
  label: string
}

export interface PredicateEvent {
  type: 'predicate'
  predicate: Predicate
}

export type SyntaxEvent =
  | GraphStartEvent
  | GraphEndEvent
  | QueryStartEvent
  | QueryEndEvent
  | VertexEvent
  | EdgeEvent
  | PropertyEvent
  | LabelEvent
  | PredicateEvent

// =============================================================================
// SCHEMAS
// =============================================================================

const name = z.string().min(1)

const propertyValueSchema = z.union([z.string(), z.number().finite(), z.boolean()])

const operandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('literal'), value: z.union([propertyValueSchema, z.null()]) }),
  z.object({ type: z.literal('property'), variable: name, key: name }),
  z.object({ type: z.literal('variable'), variable: name }),
])

export const predicateSchema: z.ZodType<Predicate> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({
      type: z.literal('comparison'),
      left: operandSchema,
      operator: z.enum(['eq', 'neq', 'lt', 'lte', 'gt', 'gte']),
      right: operandSchema,
    }),
    z.object({ type: z.literal('and'), predicates: z.array(predicateSchema).min(1) }),
    z.object({ type: z.literal('or'), predicates: z.array(predicateSchema).min(1) }),
    z.object({ type: z.literal('not'), predicate: predicateSchema }),
  ]),
)

const declarationShape = {
  variable: name.optional(),
  label: name.optional(),
  properties: z.record(z.string(), propertyValueSchema).optional(),
}

const boundsSchema = z
  .object({
    lower: z.number().int().safe().nonnegative(),
    upper: z.number().int().safe().nonnegative().optional(),
  })
  .refine((bounds) => bounds.upper === undefined || bounds.upper >= bounds.lower, {
    message: 'Upper bound must not be lower than the lower bound',
  })

export const syntaxEventSchema: z.ZodType<SyntaxEvent> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('graphStart'), ...declarationShape, id: z.number().int().safe().optional() }),
  z.object({ type: z.literal('graphEnd') }),
  z.object({ type: z.literal('queryStart') }),
  z.object({ type: z.literal('queryEnd') }),
  z.object({ type: z.literal('vertex'), ...declarationShape }),
  z.object({
    type: z.literal('edge'),
    ...declarationShape,
    direction: z.enum(['out', 'in']).optional(),
    source: name.optional(),
    target: name.optional(),
    bounds: boundsSchema.optional(),
  }),
  z.object({ type: z.literal('property'), key: name, value: propertyValueSchema }),
  z.object({ type: z.literal('label'), label: name }),
  z.object({ type: z.literal('predicate'), predicate: predicateSchema }),
])

/**
 * Validate an event fragment.
 * @throws InvalidArgumentError naming the first invalid field
 */
export function parseEvents(events: unknown): SyntaxEvent[] {
  const result = z.array(syntaxEventSchema).safeParse(events)
  if (!result.success) {
    const issue = result.error.issues[0]
    const path = issue ? formatPath(issue.path) : 'events'
    throw new InvalidArgumentError(`Invalid syntax event at ${path}: ${issue?.message ?? 'validation failed'}`, path)
  }
  return result.data
}

function formatPath(path: Array<string | number>): string {
  return path.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : `${acc}.${segment}`),
    'events',
  )
}
