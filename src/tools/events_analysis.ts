import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { eventListSchema } from "../github/schemas.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  invokeGithubTool,
  percentage,
  rankCounts,
  repositoryPath,
  tally,
  type GithubToolContext,
} from "./shared.js";

export const EVENTS_ANALYSIS_TOOL_NAME = "analyze_repository_events" as const;

const RECENT_EVENTS = 10;

const EventsAnalysisInputShape = {
  ...RepositoryIdentityShape,
  limit: z.number().optional().describe("Number of recent events to analyse (1-100, default 30)."),
} as const;

export const EventsAnalysisInputSchema = RepositoryIdentitySchema.extend({
  limit: z.number().int().min(1).max(100).default(30),
});

export type EventsAnalysisInput = z.infer<typeof EventsAnalysisInputSchema>;

export type EventTypeShare = { type: string; count: number; percentage: number };

export type EventDigest = { type: string; created_at: string | null; actor: string | null };

export type EventsAnalysis = {
  owner: string;
  repo: string;
  total_events: number;
  event_types: EventTypeShare[];
  recent_events: EventDigest[];
};

export async function collectEventsAnalysis(
  context: GithubToolContext,
  input: EventsAnalysisInput,
  sink: ProgressSink = silentSink,
): Promise<EventsAnalysis> {
  const { client, logger } = context;
  client.assertCredential();

  await notifySafely(logger, () => sink.progress(20, 100, "fetching events"));
  const fetched =
    (await client.getOptionalJson(
      `${repositoryPath(input.owner, input.repo)}/events`,
      eventListSchema,
      ["not_found"],
      { per_page: input.limit },
      { sink },
    )) ?? [];
  const events = fetched.slice(0, input.limit);

  const types = new Map<string, number>();
  for (const event of events) {
    tally(types, event.type);
  }

  await notifySafely(logger, () => sink.progress(100, 100));
  return {
    owner: input.owner,
    repo: input.repo,
    total_events: events.length,
    event_types: rankCounts(types).map(([type, count]) => ({ type, count, percentage: percentage(count, events.length) })),
    recent_events: events.slice(0, RECENT_EVENTS).map((event) => ({
      type: event.type,
      created_at: event.created_at,
      actor: event.actor?.login ?? null,
    })),
  };
}

export function renderEventsAnalysis(analysis: EventsAnalysis): string {
  const lines = [`Events: ${analysis.owner}/${analysis.repo}`, "", `Analysed: ${analysis.total_events}`];
  if (analysis.event_types.length === 0) {
    lines.push("", "No events found.");
    return lines.join("\n");
  }
  lines.push(
    `Event types: ${analysis.event_types.length}`,
    "",
    "By type:",
    ...analysis.event_types.map((share) => `  - ${share.type}: ${share.count} (${share.percentage}%)`),
  );
  return lines.join("\n");
}

export function registerEventsAnalysisTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    EVENTS_ANALYSIS_TOOL_NAME,
    {
      title: "Events analysis",
      description: "Breaks down the recent events of a GitHub repository by event type.",
      inputSchema: EventsAnalysisInputShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        EVENTS_ANALYSIS_TOOL_NAME,
        EventsAnalysisInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const analysis = await collectEventsAnalysis(context, parsed, sink);
          return buildToolSuccessResult(renderEventsAnalysis(analysis), analysis, {
            operation: EVENTS_ANALYSIS_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
            limit: parsed.limit,
          });
        },
      ),
  );
}
