// Test fixture: logger that records entries instead of printing them

import type { Logger } from "../types";

export interface LogEntry {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly message: string;
  readonly data: Record<string, unknown>;
}

export class RecordingLogger implements Logger {
  constructor(
    readonly entries: LogEntry[] = [],
    private readonly context: Record<string, unknown> = {},
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.record("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.record("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.record("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.record("error", message, data);
  }

  child(context: Record<string, unknown>): Logger {
    return new RecordingLogger(this.entries, { ...this.context, ...context });
  }

  /** Entries at the given level, in order. */
  at(level: LogEntry["level"]): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  private record(level: LogEntry["level"], message: string, data?: Record<string, unknown>): void {
    this.entries.push({ level, message, data: { ...this.context, ...data } });
  }
}
