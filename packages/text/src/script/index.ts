export { toEvents } from "./events"
