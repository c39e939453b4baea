export { continuousId, IdSequence } from './generator'
export type { IdGenerator } from './generator'
