import type { RequestHandlerExtra } from "@modelcontextprotocol/sdk/shared/protocol.js";
import type { ServerNotification, ServerRequest } from "@modelcontextprotocol/sdk/types.js";

import type { StructuredLogger } from "../logger.js";

/**
 * Caller-supplied observability channel. Every method is advisory: failures
 * inside a sink are reported to the logger and never change the outcome of
 * the call that emitted them.
 */
export interface ProgressSink {
  info(message: string): Promise<void>;
  warning(message: string): Promise<void>;
  error(message: string): Promise<void>;
  progress(done: number, total: number, message?: string): Promise<void>;
}

/** Sink discarding every notification. */
export const silentSink: ProgressSink = {
  info: async () => undefined,
  warning: async () => undefined,
  error: async () => undefined,
  progress: async () => undefined,
};

type RpcExtra = RequestHandlerExtra<ServerRequest, ServerNotification>;

/** Logger name advertised in `notifications/message`. */
const NOTIFICATION_LOGGER = "repo-scope";

/**
 * Forwards notifications to the MCP client that issued the current request.
 * Progress is only reported when the client attached a `progressToken`.
 */
export function createMcpSink(extra: RpcExtra, logger: StructuredLogger): ProgressSink {
  const progressToken = extra._meta?.progressToken;

  const send = async (notification: ServerNotification): Promise<void> => {
    try {
      await extra.sendNotification(notification);
    } catch (error) {
      logger.debug("notification_delivery_failed", {
        method: notification.method,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  };

  const message = (level: "info" | "warning" | "error") => (text: string) =>
    send({ method: "notifications/message", params: { level, logger: NOTIFICATION_LOGGER, data: text } });

  return {
    info: message("info"),
    warning: message("warning"),
    error: message("error"),
    progress: async (done, total, text) => {
      if (progressToken === undefined) {
        return;
      }
      await send({
        method: "notifications/progress",
        params: { progressToken, progress: done, total, ...(text !== undefined ? { message: text } : {}) },
      });
    },
  };
}

/**
 * Invokes a sink method, logging (never rethrowing) failures raised by custom
 * sink implementations.
 */
export async function notifySafely(
  logger: StructuredLogger,
  emit: () => Promise<void>,
): Promise<void> {
  try {
    await emit();
  } catch (error) {
    logger.warn("progress_sink_failed", { message: error instanceof Error ? error.message : String(error) });
  }
}
