// Start/stop contract for components that own a connection or a background loop

export type LifecycleStatus = "stopped" | "starting" | "running" | "stopping";

/**
 * Implemented by channels and the gateway. start() on a running component
 * and stop() on a stopped one return immediately.
 */
export interface Lifecycle {
  readonly status: LifecycleStatus;
  start(): Promise<void>;
  stop(): Promise<void>;
}
