/**
 * One device entry as Kismet reports it. The key layout depends on the Kismet
 * version and on whether field simplification was requested, so values stay
 * untyped until a field adapter resolves them.
 */
export type DeviceRecord = Record<string, unknown>;

export interface KismetCredentials {
  username: string;
  password: string;
}

export interface KismetClientOptions {
  baseUrl: string;
  /** Upper bound for a single request, including reading the body. */
  timeoutMs?: number;
  credentials?: KismetCredentials;
  userAgent?: string;
}

export interface RecentDevicesInput {
  /** Devices active within this many seconds before now. */
  windowSeconds: number;
  /** Aborts an in-flight request, for example on shutdown. */
  signal?: AbortSignal;
}
