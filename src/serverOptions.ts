import { readInt, readString, type EnvSource } from "./config/env.js";
import { isServerProfile, SERVER_PROFILES, type ServerProfile } from "./tools/index.js";

/**
 * Options describing the HTTP exposure of a tool server. When `enabled` is
 * false the remaining attributes are ignored.
 */
export interface HttpRuntimeOptions {
  enabled: boolean;
  port: number;
  host: string;
  /** Absolute endpoint path processing MCP HTTP calls. */
  path: string;
  /** Answer with JSON bodies instead of SSE streams. */
  enableJson: boolean;
  /** Run without session identifiers. */
  stateless: boolean;
}

/** Runtime configuration parsed from CLI arguments. */
export interface ServerRuntimeOptions {
  profile: ServerProfile;
  enableStdio: boolean;
  http: HttpRuntimeOptions;
  logFile: string | null;
}

const FLAG_WITH_VALUE = new Set(["--server", "--http-port", "--http-host", "--http-path", "--log-file"]);

const DEFAULT_HTTP_HOST = "127.0.0.1";
const DEFAULT_HTTP_PORT = 8000;

function parsePort(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num < 0 || num > 65_535) {
    throw new Error(`Value ${value} for ${flag} must be a port number between 0 and 65535.`);
  }
  return num;
}

function normalizeHttpPath(raw: string): string {
  const cleaned = raw.trim();
  if (!cleaned.length) {
    throw new Error("The HTTP path cannot be empty.");
  }
  return cleaned.startsWith("/") ? cleaned : `/${cleaned}`;
}

/**
 * Parses `process.argv.slice(2)`. Host and port defaults come from `MCP_HOST`
 * and `MCP_PORT`; flags override them. Malformed values throw before any
 * transport starts.
 */
export function parseServerOptions(argv: readonly string[], env: EnvSource = process.env): ServerRuntimeOptions {
  const options: ServerRuntimeOptions = {
    profile: "all",
    enableStdio: true,
    http: {
      enabled: false,
      host: readString("MCP_HOST", DEFAULT_HTTP_HOST, env),
      port: readInt("MCP_PORT", DEFAULT_HTTP_PORT, { min: 0, max: 65_535 }, env),
      path: "/mcp",
      enableJson: false,
      stateless: false,
    },
    logFile: null,
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg.startsWith("--")) {
      continue;
    }

    const [flag, inlineValue] = arg.split("=", 2);
    let value = inlineValue;
    if (FLAG_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`Flag ${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--server": {
        const profile = (value ?? "").trim();
        if (!isServerProfile(profile)) {
          throw new Error(`Unknown server profile "${profile}" (expected one of ${SERVER_PROFILES.join(", ")}).`);
        }
        options.profile = profile;
        break;
      }
      case "--no-stdio":
        options.enableStdio = false;
        break;
      case "--http":
        options.http.enabled = true;
        break;
      case "--http-port":
        options.http.port = parsePort(value ?? "", flag);
        options.http.enabled = true;
        break;
      case "--http-host": {
        const host = (value ?? "").trim();
        if (!host.length) {
          throw new Error("The HTTP host cannot be empty.");
        }
        options.http.host = host;
        options.http.enabled = true;
        break;
      }
      case "--http-path":
        options.http.path = normalizeHttpPath(value ?? "");
        options.http.enabled = true;
        break;
      case "--http-json":
        options.http.enableJson = true;
        options.http.enabled = true;
        break;
      case "--http-stateless":
        options.http.stateless = true;
        options.http.enabled = true;
        break;
      case "--log-file": {
        const path = (value ?? "").trim();
        if (!path.length) {
          throw new Error("The log file path cannot be empty.");
        }
        options.logFile = path;
        break;
      }
      default:
        break;
    }
  }

  return options;
}
