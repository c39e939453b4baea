/**
 * Handler Module
 */

export { PatternGraphHandler, createHandler } from "./handler"
export type { HandlerConfig } from "./handler"
export { HandlerBuilder } from "./builder"
