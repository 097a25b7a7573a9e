import { z } from "zod";
import { TIME_HORIZONS, TIME_RANGES } from "./config.js";
import { getTrendAnalytics } from "./analytics.js";
import { getPriorities } from "./priorities.js";
import {
  McpServer,
  splitList,
  toolResponse,
  wrapTool,
  type ContextProvider,
} from "./tool-helpers.js";

const PrioritiesInput = z.object({
  user_id: z
    .string()
    .optional()
    .describe("User to analyze (default: the authenticated user)"),
  project_ids: z.string().optional().describe("Comma-separated project ids"),
  time_horizon: z
    .enum(TIME_HORIZONS)
    .optional()
    .describe("How far ahead due dates count as pressing: today, week (default) or month"),
  include_recommendations: z
    .boolean()
    .optional()
    .describe("Generate recommendations (default true)"),
});

const AnalyticsInput = z.object({
  project_ids: z.string().optional().describe("Comma-separated project ids"),
  time_range: z
    .enum(TIME_RANGES)
    .optional()
    .describe("Window of task creation dates (default 30_days)"),
  analysis_types: z
    .string()
    .optional()
    .describe(
      "Comma-separated: completion_trends, cycle_time, velocity, task_aging, burndown, project_health"
    ),
  group_by: z.string().optional().describe("Accepted but currently ignored"),
});

export function register(server: McpServer, context: ContextProvider) {
  server.registerTool(
    "kanboard_priorities",
    {
      title: "Kanboard Priorities",
      description:
        "Analyze workload and urgency: per-user capacity utilization, the most urgent tasks scored by due date, priority and assignment, columns where tasks are stalling, and recommendations for what to do next.",
      inputSchema: PrioritiesInput.shape,
    },
    wrapTool("kanboard_priorities", async (params: z.infer<typeof PrioritiesInput>) => {
      const { source, thresholds } = await context();
      const result = await getPriorities(
        source,
        {
          userId: params.user_id,
          projectIds: splitList(params.project_ids),
          timeHorizon: params.time_horizon ?? "week",
          includeRecommendations: params.include_recommendations ?? true,
        },
        { thresholds }
      );
      return toolResponse(result);
    })
  );

  server.registerTool(
    "kanboard_analytics",
    {
      title: "Kanboard Analytics",
      description:
        "Historical trends for tasks created in a time window: completion rates, cycle time per column, velocity, task aging, burndown with a trend projection, and per-project health scores.",
      inputSchema: AnalyticsInput.shape,
    },
    wrapTool("kanboard_analytics", async (params: z.infer<typeof AnalyticsInput>) => {
      const { source, thresholds } = await context();
      const result = await getTrendAnalytics(
        source,
        {
          projectIds: splitList(params.project_ids),
          timeRange: params.time_range ?? "30_days",
          analysisTypes: splitList(params.analysis_types),
          groupBy: params.group_by,
        },
        { thresholds }
      );
      return toolResponse(result);
    })
  );
}
