/**
 * @packageDocumentation
 * @module @stepwire/adapter-node-fetch
 *
 * node-fetch transport for stepwire.
 */

export { default } from "./node-fetch-transport";
export type { NodeFetch, NodeFetchTransportOptions } from "./node-fetch-transport";
