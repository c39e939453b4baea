export { failFast, reportAll, skipInvalid } from "./strategy"
export type { SyntaxErrorStrategy } from "./strategy"
