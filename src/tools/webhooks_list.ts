import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { hookListSchema } from "../github/schemas.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  invokeGithubTool,
  repositoryPath,
  type GithubToolContext,
} from "./shared.js";

export const WEBHOOKS_LIST_TOOL_NAME = "get_repository_webhooks" as const;

const HOOKS_FETCHED = 30;
const HOOKS_SHOWN = 10;

export const WebhooksListInputSchema = RepositoryIdentitySchema;

export type WebhookDigest = {
  id: number;
  name: string;
  active: boolean;
  events: string[];
  url: string | null;
  content_type: string | null;
};

export type WebhooksList = {
  owner: string;
  repo: string;
  /** False when the token lacks the admin access the hooks listing requires. */
  accessible: boolean;
  total_webhooks: number;
  active_webhooks: number;
  webhooks: WebhookDigest[];
};

/** Drops the query string and credentials of a delivery URL; unparsable values pass through. */
export function displayHookUrl(url: string | null): string | null {
  if (!url) {
    return null;
  }
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
  } catch {
    return url;
  }
}

export async function collectWebhooks(
  context: GithubToolContext,
  input: { owner: string; repo: string },
  sink: ProgressSink = silentSink,
): Promise<WebhooksList> {
  const { client, logger } = context;
  client.assertCredential();

  await notifySafely(logger, () => sink.progress(20, 100, "fetching webhooks"));
  const hooks = await client.getOptionalJson(
    `${repositoryPath(input.owner, input.repo)}/hooks`,
    hookListSchema,
    ["authorization", "not_found"],
    { per_page: HOOKS_FETCHED },
    { sink },
  );
  await notifySafely(logger, () => sink.progress(100, 100));

  const listed = hooks ?? [];
  return {
    owner: input.owner,
    repo: input.repo,
    accessible: hooks !== null,
    total_webhooks: listed.length,
    active_webhooks: listed.filter((hook) => hook.active).length,
    webhooks: listed.slice(0, HOOKS_SHOWN).map((hook) => ({
      id: hook.id,
      name: hook.name,
      active: hook.active,
      events: hook.events,
      url: displayHookUrl(hook.config.url),
      content_type: hook.config.content_type,
    })),
  };
}

export function renderWebhooks(list: WebhooksList): string {
  const lines = [`Webhooks: ${list.owner}/${list.repo}`, ""];
  if (!list.accessible) {
    lines.push("Webhooks are not visible to the configured token (admin access required).");
    return lines.join("\n");
  }
  if (list.total_webhooks === 0) {
    lines.push("No webhooks configured.");
    return lines.join("\n");
  }
  lines.push(`Total: ${list.total_webhooks} (${list.active_webhooks} active)`);
  for (const [index, hook] of list.webhooks.entries()) {
    lines.push(`  ${index + 1}. #${hook.id} ${hook.name} (${hook.active ? "active" : "inactive"}): ${hook.url ?? "-"}`);
    if (hook.events.length > 0) {
      lines.push(`     events: ${hook.events.join(", ")}`);
    }
  }
  return lines.join("\n");
}

export function registerWebhooksListTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    WEBHOOKS_LIST_TOOL_NAME,
    {
      title: "Repository webhooks",
      description: "Lists the webhooks of a GitHub repository with their events and status (requires admin access).",
      inputSchema: RepositoryIdentityShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        WEBHOOKS_LIST_TOOL_NAME,
        WebhooksListInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const list = await collectWebhooks(context, parsed, sink);
          return buildToolSuccessResult(renderWebhooks(list), list, {
            operation: WEBHOOKS_LIST_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
          });
        },
      ),
  );
}
