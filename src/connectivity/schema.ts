/**
 * Connectivity Module - Schemas and Types
 */

/**
 * Target of the internet reachability probe.
 */
export type ConnectivityConfig = Readonly<{
  host: string;
  port: number;
  timeoutMs: number;
}>;

/**
 * Connection flags reported to the front end.
 */
export type ConnectivityStatus = Readonly<{
  mqtt: boolean;
  realtime: boolean;
}>;
