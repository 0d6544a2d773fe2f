import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { DAY_MS, eventListSchema, parseGithubTimestamp } from "../github/schemas.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  invokeGithubTool,
  rankCounts,
  repositoryPath,
  tally,
  type GithubToolContext,
} from "./shared.js";

export const ACTIVITY_TIMELINE_TOOL_NAME = "get_activity_timeline" as const;

const EVENTS_FETCHED = 100;
const BUSIEST_DAYS = 10;

const ActivityTimelineInputShape = {
  ...RepositoryIdentityShape,
  days: z.number().optional().describe("Length of the period in days (1-365, default 30)."),
} as const;

export const ActivityTimelineInputSchema = RepositoryIdentitySchema.extend({
  days: z.number().int().min(1).max(365).default(30),
});

export type ActivityTimelineInput = z.infer<typeof ActivityTimelineInputSchema>;

export type DayActivity = { date: string; events: number };

export type ActivityTimeline = {
  owner: string;
  repo: string;
  period_days: number;
  total_events: number;
  active_days: number;
  quiet_days: number;
  busiest_days: DayActivity[];
};

/**
 * Buckets the latest public events of a repository per UTC day over the
 * requested period. Repositories without an event feed read as inactive.
 */
export async function collectActivityTimeline(
  context: GithubToolContext,
  input: ActivityTimelineInput,
  sink: ProgressSink = silentSink,
): Promise<ActivityTimeline> {
  const { client, clock, logger } = context;
  client.assertCredential();

  await notifySafely(logger, () => sink.progress(20, 100, "fetching events"));
  const events =
    (await client.getOptionalJson(
      `${repositoryPath(input.owner, input.repo)}/events`,
      eventListSchema,
      ["not_found"],
      { per_page: EVENTS_FETCHED },
      { sink },
    )) ?? [];

  const cutoff = clock.now() - input.days * DAY_MS;
  const perDay = new Map<string, number>();
  let total = 0;
  for (const event of events) {
    const createdAt = parseGithubTimestamp(event.created_at);
    if (createdAt && createdAt.getTime() >= cutoff) {
      total += 1;
      tally(perDay, createdAt.toISOString().slice(0, 10));
    }
  }

  await notifySafely(logger, () => sink.progress(100, 100));
  return {
    owner: input.owner,
    repo: input.repo,
    period_days: input.days,
    total_events: total,
    active_days: perDay.size,
    quiet_days: Math.max(0, input.days - perDay.size),
    busiest_days: rankCounts(perDay)
      .slice(0, BUSIEST_DAYS)
      .map(([date, count]) => ({ date, events: count })),
  };
}

export function renderActivityTimeline(timeline: ActivityTimeline): string {
  const lines = [
    `Activity timeline: ${timeline.owner}/${timeline.repo} (last ${timeline.period_days} days)`,
    "",
    `Events: ${timeline.total_events}`,
    `Active days: ${timeline.active_days}`,
    `Quiet days: ${timeline.quiet_days}`,
  ];
  if (timeline.busiest_days.length === 0) {
    lines.push("", "No activity in this period.");
  } else {
    lines.push("", "Busiest days:", ...timeline.busiest_days.map((day) => `  - ${day.date}: ${day.events} events`));
  }
  return lines.join("\n");
}

export function registerActivityTimelineTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    ACTIVITY_TIMELINE_TOOL_NAME,
    {
      title: "Activity timeline",
      description: "Counts the recent events of a GitHub repository per day and reports its busiest and quiet days.",
      inputSchema: ActivityTimelineInputShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        ACTIVITY_TIMELINE_TOOL_NAME,
        ActivityTimelineInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const timeline = await collectActivityTimeline(context, parsed, sink);
          return buildToolSuccessResult(renderActivityTimeline(timeline), timeline, {
            operation: ACTIVITY_TIMELINE_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
            days: parsed.days,
          });
        },
      ),
  );
}
