/**
 * Connectivity Module - Public API
 */
export type { ConnectivityConfig, ConnectivityStatus } from "./schema.js";
export { checkInternetConnection } from "./service.js";
