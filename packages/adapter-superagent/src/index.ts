/**
 * @packageDocumentation
 * @module @stepwire/adapter-superagent
 *
 * Superagent transport for stepwire.
 */

export { default } from "./superagent-transport";
