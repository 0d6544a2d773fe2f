import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

/** Placeholder inserted where a secret used to be. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are masked when structured redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api_key",
  "token",
  "access_token",
  "github_token",
  "cookie",
  "set-cookie",
]);

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  server?: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Optional file mirroring every entry written to stdout. */
  readonly logFile?: string | null;
  readonly maxFileSizeBytes?: number;
  /** Number of files retained by rotation, the active one included. */
  readonly maxFileCount?: number;
  /** Literal secrets or patterns scrubbed from every serialised line. */
  readonly redactSecrets?: Array<string | RegExp>;
  /** Masks {@link SENSITIVE_KEYS}; defaults to the `MCP_LOG_REDACT` directive. */
  readonly redactionEnabled?: boolean;
  /** Server profile stamped on each entry. */
  readonly server?: string;
  /** Destination of the JSON lines; defaults to stdout. */
  readonly write?: (line: string) => void;
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Parses `MCP_LOG_REDACT`, a comma separated list mixing an on/off toggle with
 * literal secrets (`"on,ghp_"`). Providing secrets without a toggle enables
 * redaction.
 */
export function parseRedactionDirectives(raw: string | undefined): { enabled: boolean; tokens: string[] } {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  let enabled: boolean | undefined;
  const tokens: string[] = [];
  for (const directive of raw.split(",").map((value) => value.trim())) {
    if (directive.length === 0) {
      continue;
    }
    const lowered = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(lowered)) {
      enabled = false;
    } else if (REDACTION_ENABLE_TOKENS.has(lowered)) {
      enabled = true;
    } else {
      tokens.push(directive);
    }
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

/**
 * Structured logger emitting one JSON object per line. File mirroring is
 * optional; appends are queued so the file keeps the stdout ordering.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly server: string | undefined;
  private readonly writeLine: (line: string) => void;
  private readonly entryListener: ((entry: LogEntry) => void) | undefined;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    const directives = parseRedactionDirectives(process.env.MCP_LOG_REDACT);
    this.logFile = options.logFile ?? null;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.redactSecrets = [
      ...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])]),
    ].filter((secret) => typeof secret !== "string" || secret.length > 0);
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.server = options.server;
    this.writeLine = options.write ?? ((line) => process.stdout.write(line));
    this.entryListener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /** Resolves once every queued file append has completed. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.server !== undefined ? { server: this.server } : {}),
      ...(payload !== undefined ? { payload: this.redactStructured(payload) } : {}),
    };
    const line = `${this.scrubSecrets(JSON.stringify(entry))}\n`;
    this.writeLine(line);
    this.entryListener?.(entry);

    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        await this.ensureLogDirectory(logFile);
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      })
      .catch((error: unknown) => {
        this.logDirectoryReady = false;
        process.stderr.write(
          `${JSON.stringify({
            timestamp: new Date().toISOString(),
            level: "error",
            message: "log_file_write_failed",
            payload: { message: error instanceof Error ? error.message : String(error) },
          })}\n`,
        );
      });
  }

  private async ensureLogDirectory(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize: number;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }
    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }
    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  private scrubSecrets(line: string): string {
    let sanitised = line;
    for (const pattern of this.redactSecrets) {
      sanitised =
        typeof pattern === "string" ? sanitised.split(pattern).join(REDACTION_TOKEN) : sanitised.replace(pattern, REDACTION_TOKEN);
    }
    return sanitised;
  }

  private redactStructured(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redactStructured(item));
    }
    if (value && typeof value === "object" && !(value instanceof Date)) {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.redactStructured(entry);
      }
      return result;
    }
    return value;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }
}
