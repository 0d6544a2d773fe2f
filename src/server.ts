#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { startHttpServer } from "./httpServer.js";
import { StructuredLogger } from "./logger.js";
import { createRuntime } from "./runtime.js";
import { parseServerOptions, type ServerRuntimeOptions } from "./serverOptions.js";

/**
 * Parses the CLI, builds the runtime of the requested profile and connects it
 * to either the HTTP transport or stdio.
 */
async function main(): Promise<void> {
  let options: ServerRuntimeOptions;
  try {
    options = parseServerOptions(process.argv.slice(2));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    new StructuredLogger({ write: (line) => process.stderr.write(line) }).error("cli_options_invalid", { message });
    process.exit(1);
  }

  let enableStdio = options.enableStdio;
  const httpEnabled = options.http.enabled;
  if (!enableStdio && !httpEnabled) {
    new StructuredLogger({ write: (line) => process.stderr.write(line) }).error("no_transport_enabled", {});
    process.exit(1);
  }
  if (httpEnabled) {
    enableStdio = false;
  }

  // stdout belongs to the JSON-RPC stream when serving over stdio.
  const runtime = createRuntime({
    profile: options.profile,
    logFile: options.logFile,
    ...(enableStdio ? { logWrite: (line: string) => process.stderr.write(line) } : {}),
  });
  const { logger } = runtime;

  const cleanup: Array<() => Promise<void>> = [];

  if (httpEnabled) {
    if (options.enableStdio) {
      logger.warn("stdio_disabled_due_to_http");
    }
    try {
      const handle = await startHttpServer(runtime.server, options.http, logger, {
        profile: runtime.profile,
        tools: runtime.tools,
      });
      cleanup.push(handle.close);
    } catch (error) {
      logger.error("http_start_failed", { message: error instanceof Error ? error.message : String(error) });
      await logger.flush();
      process.exit(1);
    }
  }

  if (enableStdio) {
    const transport = new StdioServerTransport();
    await runtime.server.connect(transport);
    cleanup.push(() => transport.close());
    logger.info("stdio_listening");
  }

  logger.info("runtime_started", { profile: runtime.profile, stdio: enableStdio, http: httpEnabled });

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.warn("shutdown_signal", { signal, rate_budget: runtime.budget.stats() });
    for (const closer of cleanup) {
      try {
        await closer();
      } catch (error) {
        logger.error("transport_close_failed", { message: error instanceof Error ? error.message : String(error) });
      }
    }
    await logger.flush();
    process.exit(0);
  };
  process.once("SIGINT", (signal) => void shutdown(signal));
  process.once("SIGTERM", (signal) => void shutdown(signal));
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
    process.exit(1);
  });
}
