/**
 * @packageDocumentation
 * @module @stepwire/adapter-axios
 *
 * Axios transport for stepwire.
 */

export { default } from "./axios-transport";
export type { AxiosTransportOptions } from "./axios-transport";
