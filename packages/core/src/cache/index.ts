export { VariableCache } from './variable-cache'
export type { Resolution } from './variable-cache'
