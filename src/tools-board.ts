import { z } from "zod";
import { SORT_KEYS, TASK_STATUS_FILTERS } from "./config.js";
import { getOverview } from "./overview.js";
import { DEFAULT_TASK_QUERY, listTasks } from "./tasks.js";
import {
  McpServer,
  splitList,
  toolResponse,
  wrapTool,
  type ContextProvider,
} from "./tool-helpers.js";

const OverviewInput = z.object({
  include_task_counts: z
    .boolean()
    .optional()
    .describe("Count tasks per column (default true)"),
  include_inactive_projects: z
    .boolean()
    .optional()
    .describe("Include closed projects (default false)"),
});

const TasksInput = z.object({
  project_ids: z
    .string()
    .optional()
    .describe("Comma-separated project ids (default: every accessible project)"),
  assignee_ids: z
    .string()
    .optional()
    .describe("Comma-separated user ids; unassigned tasks are dropped when set"),
  status_filter: z
    .enum(TASK_STATUS_FILTERS)
    .optional()
    .describe("active (default), completed or all"),
  due_date_start: z.string().optional().describe("Earliest due date, YYYY-MM-DD"),
  due_date_end: z.string().optional().describe("Latest due date, YYYY-MM-DD (inclusive)"),
  include_overdue: z.boolean().optional().describe("Keep overdue tasks (default false)"),
  include_time_tracking: z
    .boolean()
    .optional()
    .describe("Attach estimated/spent hours (default true)"),
  sort_by: z
    .string()
    .optional()
    .describe(`${SORT_KEYS.join(", ")}; unknown keys sort by due date (default due_date)`),
  limit: z.number().int().nonnegative().optional().describe("Maximum tasks returned (default 20)"),
  summary_mode: z
    .boolean()
    .optional()
    .describe("Reduced records, up to 200 (default true); detail mode caps at 100 and 200 KB"),
});

export function register(server: McpServer, context: ContextProvider) {
  server.registerTool(
    "kanboard_overview",
    {
      title: "Kanboard Overview",
      description:
        "List accessible Kanboard projects with their columns, swimlanes, members and per-column task counts, plus the authenticated user.",
      inputSchema: OverviewInput.shape,
    },
    wrapTool("kanboard_overview", async (params: z.infer<typeof OverviewInput>) => {
      const { source } = await context();
      const overview = await getOverview(source, {
        includeTaskCounts: params.include_task_counts,
        includeInactiveProjects: params.include_inactive_projects,
      });
      return toolResponse(overview);
    })
  );

  server.registerTool(
    "kanboard_tasks",
    {
      title: "Kanboard Tasks",
      description:
        "Filter, sort and list tasks across projects. Returns summary counts (total, overdue, due this week, unassigned) and either reduced task summaries or full task details. Detail listings are trimmed to fit the response size limit and flagged as truncated.",
      inputSchema: TasksInput.shape,
    },
    wrapTool("kanboard_tasks", async (params: z.infer<typeof TasksInput>) => {
      const dueDateRange =
        params.due_date_start || params.due_date_end
          ? { start: params.due_date_start, end: params.due_date_end }
          : undefined;

      const { source, thresholds } = await context();
      const result = await listTasks(
        source,
        {
          projectIds: splitList(params.project_ids),
          assigneeIds: splitList(params.assignee_ids),
          statusFilter: params.status_filter ?? DEFAULT_TASK_QUERY.statusFilter,
          dueDateRange,
          includeOverdue: params.include_overdue ?? DEFAULT_TASK_QUERY.includeOverdue,
          includeTimeTracking:
            params.include_time_tracking ?? DEFAULT_TASK_QUERY.includeTimeTracking,
          sortBy: params.sort_by ?? DEFAULT_TASK_QUERY.sortBy,
          limit: params.limit ?? DEFAULT_TASK_QUERY.limit,
          summaryMode: params.summary_mode ?? DEFAULT_TASK_QUERY.summaryMode,
        },
        { thresholds }
      );
      return toolResponse(result);
    })
  );
}
