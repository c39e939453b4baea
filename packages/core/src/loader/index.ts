/**
 * Loader Module
 */

export { Loader } from './loader'
export {
  resolveLoaderConfig,
  loaderConfigSchema,
  defaultLabelFor,
  DEFAULT_GRAPH_LABEL,
  DEFAULT_VERTEX_LABEL,
  DEFAULT_EDGE_LABEL,
} from './config'
export type { LoaderConfig, ResolvedLoaderConfig } from './config'
export { parseEvents, syntaxEventSchema, predicateSchema } from './events'
export type {
  SyntaxEvent,
  GraphStartEvent,
  GraphEndEvent,
  QueryStartEvent,
  QueryEndEvent,
  VertexEvent,
  EdgeEvent,
  PropertyEvent,
  LabelEvent,
  PredicateEvent,
} from './events'
