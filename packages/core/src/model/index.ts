export type {
  PropertyValue,
  Properties,
  EntityKind,
  Element,
  Graph,
  Vertex,
  Edge,
  EdgeBounds,
} from './types'
