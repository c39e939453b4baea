/**
 * Loader Configuration
 *
 * Every knob has a default; zod applies them and rejects invalid values.
 */

import { z } from 'zod'
import { InvalidArgumentError } from '../errors'
import { continuousId, type IdGenerator } from '../ids'
import type { EntityKind } from '../model'
import { createLogger, type Logger } from '../utils/logger'

export const DEFAULT_GRAPH_LABEL = '__GRAPH'
export const DEFAULT_VERTEX_LABEL = '__VERTEX'
export const DEFAULT_EDGE_LABEL = '__EDGE'

/**
 * Loader options. All fields are optional.
 */
export interface LoaderConfig {
  /** Label for graphs declared without one (default: '__GRAPH') */
  defaultGraphLabel?: string
  /** Label for vertices declared without one (default: '__VERTEX') */
  defaultVertexLabel?: string
  /** Label for edges declared without one (default: '__EDGE') */
  defaultEdgeLabel?: string
  /** Apply the default graph label (default: true) */
  useDefaultGraphLabel?: boolean
  useDefaultVertexLabel?: boolean
  useDefaultEdgeLabel?: boolean
  /** Graph id strategy (default: continuous ids from 0) */
  nextGraphId?: IdGenerator
  nextVertexId?: IdGenerator
  nextEdgeId?: IdGenerator
  logger?: Logger
}

const idGeneratorSchema = z.custom<IdGenerator>((value) => typeof value === 'function', {
  message: 'Id generator must be a function',
})

const loggerSchema = z.custom<Logger>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    'child' in value &&
    typeof value.child === 'function',
  { message: 'Logger must be a pino logger' },
)

const labelSchema = z.string().min(1, 'Label must not be empty')

export const loaderConfigSchema = z.object({
  defaultGraphLabel: labelSchema.default(DEFAULT_GRAPH_LABEL),
  defaultVertexLabel: labelSchema.default(DEFAULT_VERTEX_LABEL),
  defaultEdgeLabel: labelSchema.default(DEFAULT_EDGE_LABEL),
  useDefaultGraphLabel: z.boolean().default(true),
  useDefaultVertexLabel: z.boolean().default(true),
  useDefaultEdgeLabel: z.boolean().default(true),
  nextGraphId: idGeneratorSchema.default(() => continuousId()),
  nextVertexId: idGeneratorSchema.default(() => continuousId()),
  nextEdgeId: idGeneratorSchema.default(() => continuousId()),
  logger: loggerSchema.default(() => createLogger()),
})

export type ResolvedLoaderConfig = z.output<typeof loaderConfigSchema>

/**
 * Apply defaults and validate.
 * @throws InvalidArgumentError naming the first invalid option
 */
export function resolveLoaderConfig(config: LoaderConfig = {}): ResolvedLoaderConfig {
  const result = loaderConfigSchema.safeParse(config)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue?.path.join('.') ?? 'config'
    throw new InvalidArgumentError(
      `Invalid loader configuration: ${field}: ${issue?.message ?? 'validation failed'}`,
      field,
    )
  }
  return result.data
}

/**
 * Default label applied to new entities of `kind`, or undefined when disabled.
 */
export function defaultLabelFor(config: ResolvedLoaderConfig, kind: EntityKind): string | undefined {
  switch (kind) {
    case 'graph':
      return config.useDefaultGraphLabel ? config.defaultGraphLabel : undefined
    case 'vertex':
      return config.useDefaultVertexLabel ? config.defaultVertexLabel : undefined
    case 'edge':
      return config.useDefaultEdgeLabel ? config.defaultEdgeLabel : undefined
  }
}
