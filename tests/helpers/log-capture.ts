/**
 * Log Capture Helper
 *
 * Collects Pino JSON lines written through `initializeLogger({ stream })` so
 * tests can assert on structured log output.
 *
 * @module tests/helpers/log-capture
 */

import { Writable } from "stream";

/**
 * Captured log entry (Pino JSON with the level formatter applied)
 */
export interface LogEntry {
  level: string;
  component?: string;
  msg: string;
  [key: string]: unknown;
}

function isLogEntry(value: unknown): value is LogEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "string" &&
    "msg" in value &&
    typeof value.msg === "string"
  );
}

export class LogCapture {
  private logs: LogEntry[] = [];
  public readonly stream: Writable;

  constructor() {
    this.stream = new Writable({
      write: (chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) => {
        const text = typeof chunk === "string" ? chunk : chunk.toString();
        for (const line of text.split("\n")) {
          if (line.trim() === "") continue;
          const parsed: unknown = JSON.parse(line);
          if (isLogEntry(parsed)) {
            this.logs.push(parsed);
          }
        }
        callback(null);
      },
    });
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  byMessage(msg: string): LogEntry[] {
    return this.logs.filter((entry) => entry.msg === msg);
  }

  byComponent(component: string): LogEntry[] {
    return this.logs.filter((entry) => entry.component === component);
  }

  byLevel(level: string): LogEntry[] {
    return this.logs.filter((entry) => entry.level === level);
  }

  /**
   * Entries carrying a `metric` field with the given name
   */
  metrics(name: string): LogEntry[] {
    return this.logs.filter((entry) => entry["metric"] === name);
  }

  clear(): void {
    this.logs = [];
  }
}
