import { StructuredLogger, type LogLevel } from "../../src/logger.js";

export interface RecordedEntry {
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/**
 * Logger capturing entries in memory instead of writing JSON lines, so tests
 * can assert on the structured events a component emits.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: RecordedEntry[] = [];

  constructor() {
    super({ logFile: null, redactionEnabled: false, write: () => undefined });
  }

  /** Entries whose message equals {@link message}, in emission order. */
  find(message: string): RecordedEntry[] {
    return this.entries.filter((entry) => entry.message === message);
  }

  private record(level: LogLevel, message: string, payload?: unknown): void {
    this.entries.push({ level, message, payload });
  }

  override debug(message: string, payload?: unknown): void {
    this.record("debug", message, payload);
  }

  override info(message: string, payload?: unknown): void {
    this.record("info", message, payload);
  }

  override warn(message: string, payload?: unknown): void {
    this.record("warn", message, payload);
  }

  override error(message: string, payload?: unknown): void {
    this.record("error", message, payload);
  }
}
