// @docent/core — zero-dependency contract package
// Re-exports all types, interfaces, and core logic

// Types
export * from "./types";

// Locks
export { Semaphore, Mutex, ReadWriteLock } from "./locks";

// Session store
export { SessionStore, DEFAULT_MAX_CONTEXT_MESSAGES } from "./session-store";
