/**
 * @packageDocumentation
 * @module @stepwire/adapter-fetch
 *
 * Fetch API transport for stepwire. Uses the runtime's global `fetch`,
 * making it the choice when no extra dependency is wanted.
 */

export { default } from "./fetch-transport";
export type { FetchTransportOptions } from "./fetch-transport";
