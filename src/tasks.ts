/**
 * Task collection — fetch, normalize, filter, sort and bound task listings.
 *
 * Every request rebuilds task records from a fresh Kanboard snapshot.
 * The priority and trend analyzers call selectTasks() with their own
 * parameters; the kanboard_tasks tool calls listTasks().
 */

import {
  DEFAULT_THRESHOLDS,
  PRIORITY_TIERS,
  type AnalyticsThresholds,
  type PriorityTier,
  type TaskStatusFilter,
} from "./config.js";
import { isCompletedColumn } from "./completion.js";
import type {
  KanboardProject,
  KanboardTask,
  KanboardUser,
  TaskSource,
} from "./kanboard.js";
import { log } from "./logger.js";
import { collectOrThrow, fanOut } from "./pool.js";
import { payloadSize } from "./tool-helpers.js";
import { addDays, DAY_MS, formatTimestamp, parseTimestamp } from "./time.js";

// ─── Types ──────────────────────────────────────────────

export interface ProjectInfo {
  readonly id: string;
  readonly name: string;
}

export interface UserInfo {
  readonly id: string;
  readonly username: string;
  readonly name: string;
}

export interface TaskStatus {
  readonly column: string;
  readonly swimlane: string;
}

/** ISO timestamps (YYYY-MM-DDTHH:MM:SSZ) or null when absent */
export interface TaskDates {
  readonly created: string | null;
  readonly due: string | null;
  readonly modified: string | null;
  readonly started: string | null;
}

export interface TimeTracking {
  readonly estimated_hours: number;
  readonly spent_hours: number;
  /** estimated − spent; negative when over budget */
  readonly remaining_hours: number;
}

export interface TaskDetail {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly project: ProjectInfo;
  readonly assignee: UserInfo | null;
  readonly status: TaskStatus;
  readonly dates: TaskDates;
  readonly time_tracking?: TimeTracking;
  readonly priority: PriorityTier;
  readonly category: string;
  readonly tags: readonly string[];
  readonly url: string;
  readonly is_overdue: boolean;
  /** Whole days until due, floored; negative once overdue */
  readonly days_until_due: number | null;
}

export interface TaskSummary {
  readonly id: string;
  readonly title: string;
  readonly project: ProjectInfo;
  readonly assignee?: UserInfo;
  readonly status: string;
  readonly due_date?: string;
  readonly is_overdue: boolean;
  readonly days_until_due?: number;
}

export interface TasksSummary {
  total_tasks: number;
  overdue_tasks: number;
  due_this_week: number;
  unassigned_tasks: number;
}

export interface TasksResponse {
  summary: TasksSummary;
  tasks?: TaskDetail[];
  task_summaries?: TaskSummary[];
  truncated?: boolean;
  truncated_at?: number;
}

export interface DateRange {
  /** YYYY-MM-DD, inclusive */
  start?: string;
  /** YYYY-MM-DD, inclusive of the whole day */
  end?: string;
}

export interface TaskQuery {
  projectIds: string[];
  assigneeIds: string[];
  statusFilter: TaskStatusFilter;
  dueDateRange?: DateRange;
  includeOverdue: boolean;
  includeTimeTracking: boolean;
  /** due_date | priority | created; anything else sorts by due date */
  sortBy: string;
  limit: number;
  summaryMode: boolean;
}

export const DEFAULT_TASK_QUERY: TaskQuery = {
  projectIds: [],
  assigneeIds: [],
  statusFilter: "active",
  includeOverdue: false,
  includeTimeTracking: true,
  sortBy: "due_date",
  limit: 20,
  summaryMode: true,
};

export interface AnalyticsOptions {
  /** Evaluation instant (default: now) */
  now?: Date;
  thresholds?: AnalyticsThresholds;
}

// ─── Normalization ──────────────────────────────────────

interface ProjectLookups {
  columns: Map<number, string>;
  swimlanes: Map<number, string>;
  users: Map<number, UserInfo>;
}

export function priorityTier(value: number): PriorityTier {
  return Number.isInteger(value) && value >= 0 && value < PRIORITY_TIERS.length
    ? PRIORITY_TIERS[value]
    : "normal";
}

export function dueDateInfo(
  due: Date | null,
  now: Date
): { isOverdue: boolean; daysUntilDue: number | null } {
  if (!due) return { isOverdue: false, daysUntilDue: null };
  return {
    isOverdue: due.getTime() < now.getTime(),
    daysUntilDue: Math.floor((due.getTime() - now.getTime()) / DAY_MS),
  };
}

export function taskUrl(baseUrl: string, taskId: number, projectId: number): string {
  return `${baseUrl}/?controller=TaskViewController&action=show&task_id=${taskId}&project_id=${projectId}`;
}

function stamp(date: Date | null): string | null {
  return date ? formatTimestamp(date) : null;
}

export function buildTaskDetail(
  task: KanboardTask,
  project: KanboardProject,
  lookups: ProjectLookups,
  baseUrl: string,
  includeTimeTracking: boolean,
  now: Date
): TaskDetail {
  const { isOverdue, daysUntilDue } = dueDateInfo(task.date_due, now);
  const assignee = task.owner_id > 0 ? lookups.users.get(task.owner_id) ?? null : null;

  return Object.freeze({
    id: String(task.id),
    title: task.title,
    description: task.description,
    project: { id: String(project.id), name: project.name },
    assignee,
    status: {
      column: lookups.columns.get(task.column_id) ?? "",
      swimlane: lookups.swimlanes.get(task.swimlane_id) ?? "",
    },
    dates: {
      created: stamp(task.date_creation),
      due: stamp(task.date_due),
      modified: stamp(task.date_modification),
      started: stamp(task.date_started),
    },
    ...(includeTimeTracking && {
      time_tracking: {
        estimated_hours: task.time_estimated,
        spent_hours: task.time_spent,
        remaining_hours: task.time_estimated - task.time_spent,
      },
    }),
    priority: priorityTier(task.priority),
    category: task.category_id > 0 ? String(task.category_id) : "",
    tags: [],
    url: taskUrl(baseUrl, task.id, project.id),
    is_overdue: isOverdue,
    days_until_due: daysUntilDue,
  });
}

function toUserInfo(user: KanboardUser): UserInfo {
  return { id: String(user.id), username: user.username, name: user.name };
}

// ─── Collection ─────────────────────────────────────────

/** Accessible projects, narrowed to `projectIds` when any are given */
export async function resolveProjects(
  source: TaskSource,
  projectIds: readonly string[]
): Promise<KanboardProject[]> {
  const projects = await source.fetchAccessibleProjects();
  if (projectIds.length === 0) return projects;
  const wanted = new Set(projectIds);
  return projects.filter((p) => wanted.has(String(p.id)));
}

async function loadProjectTasks(
  source: TaskSource,
  project: KanboardProject,
  includeTimeTracking: boolean,
  now: Date
): Promise<TaskDetail[]> {
  const [tasks, columns, swimlanes, users] = await Promise.all([
    source.fetchTasks(project.id),
    source.fetchColumns(project.id),
    source.fetchSwimlanes(project.id),
    source.fetchProjectUsers(project.id),
  ]);

  const lookups: ProjectLookups = {
    columns: new Map(columns.map((c) => [c.id, c.title])),
    swimlanes: new Map(swimlanes.map((s) => [s.id, s.name])),
    users: new Map(users.map((u) => [u.id, toUserInfo(u)])),
  };

  return tasks.map((task) =>
    buildTaskDetail(task, project, lookups, source.baseUrl, includeTimeTracking, now)
  );
}

/**
 * Fetch and normalize tasks for every project concurrently.
 * One failing project fails the whole collection.
 */
export async function collectTasks(
  source: TaskSource,
  projects: readonly KanboardProject[],
  options: { includeTimeTracking: boolean; now: Date }
): Promise<TaskDetail[]> {
  const results = await fanOut(projects, (project) =>
    loadProjectTasks(source, project, options.includeTimeTracking, options.now)
  );

  for (const result of results) {
    if (!result.ok) {
      log("warn", "project fetch failed", {
        project: projects[result.index].id,
        error: result.error instanceof Error ? result.error.message : String(result.error),
      });
    }
  }

  return collectOrThrow(results).flat();
}

// ─── Filtering & Sorting ────────────────────────────────

type ListedTask = TaskDetail | TaskSummary;

/** The fields filtering and sorting look at, for either record shape */
interface TaskView {
  column: string;
  assigneeId: string | null;
  isOverdue: boolean;
  due: string | null;
  created: string | null;
  priority: PriorityTier;
}

function viewOf(task: ListedTask): TaskView {
  if ("dates" in task) {
    return {
      column: task.status.column,
      assigneeId: task.assignee?.id ?? null,
      isOverdue: task.is_overdue,
      due: task.dates.due,
      created: task.dates.created,
      priority: task.priority,
    };
  }
  return {
    column: task.status,
    assigneeId: task.assignee?.id ?? null,
    isOverdue: task.is_overdue,
    due: task.due_date ?? null,
    created: null,
    priority: "normal",
  };
}

function inDateRange(due: string | null, range: DateRange): boolean {
  const dueDate = parseTimestamp(due);
  if (!dueDate) return false;

  if (range.start) {
    const start = parseTimestamp(range.start);
    if (!start || dueDate < start) return false;
  }

  if (range.end) {
    const end = parseTimestamp(range.end);
    if (!end || dueDate.getTime() >= addDays(end, 1).getTime()) return false;
  }

  return true;
}

type FilterQuery = Pick<
  TaskQuery,
  "statusFilter" | "assigneeIds" | "includeOverdue" | "dueDateRange"
>;

export function shouldIncludeTask(task: ListedTask, query: FilterQuery): boolean {
  const view = viewOf(task);

  if (query.statusFilter === "active" && isCompletedColumn(view.column)) return false;
  if (query.statusFilter === "completed" && !isCompletedColumn(view.column)) return false;

  if (query.assigneeIds.length > 0) {
    if (view.assigneeId === null || !query.assigneeIds.includes(view.assigneeId)) {
      return false;
    }
  }

  if (!query.includeOverdue && view.isOverdue) return false;

  if (query.dueDateRange && !inDateRange(view.due, query.dueDateRange)) return false;

  return true;
}

export function filterTasks<T extends ListedTask>(tasks: readonly T[], query: FilterQuery): T[] {
  return tasks.filter((task) => shouldIncludeTask(task, query));
}

const PRIORITY_RANK: Record<PriorityTier, number> = {
  urgent: 3,
  high: 2,
  normal: 1,
  low: 0,
};

/** Ascending by time; missing or unparseable values go last */
function compareTimes(a: string | null, b: string | null, direction: 1 | -1): number {
  const ta = parseTimestamp(a)?.getTime();
  const tb = parseTimestamp(b)?.getTime();
  if (ta === undefined && tb === undefined) return 0;
  if (ta === undefined) return 1;
  if (tb === undefined) return -1;
  return (ta - tb) * direction;
}

/** Stable sort; returns a new array */
export function sortTasks<T extends ListedTask>(tasks: readonly T[], sortBy: string): T[] {
  const keyed = tasks.map((task) => ({ task, view: viewOf(task) }));

  switch (sortBy) {
    case "priority":
      keyed.sort((a, b) => PRIORITY_RANK[b.view.priority] - PRIORITY_RANK[a.view.priority]);
      break;
    case "created":
      keyed.sort((a, b) => compareTimes(a.view.created, b.view.created, -1));
      break;
    default:
      keyed.sort((a, b) => compareTimes(a.view.due, b.view.due, 1));
  }

  return keyed.map((k) => k.task);
}

// ─── Output Shaping ─────────────────────────────────────

export function summarizeTasks(tasks: readonly ListedTask[], now: Date): TasksSummary {
  const weekFromNow = addDays(now, 7);
  const summary: TasksSummary = {
    total_tasks: tasks.length,
    overdue_tasks: 0,
    due_this_week: 0,
    unassigned_tasks: 0,
  };

  for (const task of tasks) {
    const view = viewOf(task);
    if (view.isOverdue) summary.overdue_tasks++;
    if (view.assigneeId === null) summary.unassigned_tasks++;

    const due = parseTimestamp(view.due);
    if (due && due > now && due < weekFromNow) summary.due_this_week++;
  }

  return summary;
}

export function toTaskSummary(task: TaskDetail): TaskSummary {
  return {
    id: task.id,
    title: task.title,
    project: task.project,
    ...(task.assignee && { assignee: { ...task.assignee } }),
    status: task.status.column,
    ...(task.dates.due !== null && { due_date: task.dates.due }),
    is_overdue: task.is_overdue,
    ...(task.days_until_due !== null && { days_until_due: task.days_until_due }),
  };
}

export function toTaskSummaries(tasks: readonly TaskDetail[], limit: number): TaskSummary[] {
  return tasks.slice(0, limit).map(toTaskSummary);
}

/**
 * Cut a detail listing to `limit`, then drop trailing tasks until the
 * serialized response fits in `maxBytes`.
 *
 * The summary is always sent, so a `maxBytes` smaller than an empty
 * listing cannot be met; config rejects such values (MIN_RESPONSE_BYTES).
 */
export function fitToResponseSize(
  summary: TasksSummary,
  tasks: readonly TaskDetail[],
  limit: number,
  maxBytes: number
): TasksResponse {
  const candidates = tasks.slice(0, limit);

  for (let count = candidates.length; count >= 0; count--) {
    const truncated = count < candidates.length;
    const response: TasksResponse = {
      summary,
      tasks: candidates.slice(0, count),
      ...(truncated && { truncated: true, truncated_at: count }),
    };
    if (payloadSize(response) <= maxBytes) {
      if (truncated) {
        log("info", "task listing truncated to fit response size", {
          requested: candidates.length,
          emitted: count,
        });
      }
      return response;
    }
  }

  // Only reachable with maxBytes below MIN_RESPONSE_BYTES
  return { summary, tasks: [], truncated: true, truncated_at: 0 };
}

/** Clamp a requested limit to the ceiling for the output mode */
export function effectiveLimit(
  limit: number,
  summaryMode: boolean,
  thresholds: AnalyticsThresholds = DEFAULT_THRESHOLDS
): number {
  const ceiling = summaryMode ? thresholds.summaryLimitCeiling : thresholds.detailLimitCeiling;
  return Math.max(0, Math.min(Math.floor(limit), ceiling));
}

/** Build a listing from already-filtered, already-sorted tasks */
export function shapeListing(
  tasks: readonly TaskDetail[],
  query: Pick<TaskQuery, "limit" | "summaryMode">,
  now: Date,
  thresholds: AnalyticsThresholds = DEFAULT_THRESHOLDS
): TasksResponse {
  const summary = summarizeTasks(tasks, now);
  const limit = effectiveLimit(query.limit, query.summaryMode, thresholds);

  if (query.summaryMode) {
    return { summary, task_summaries: toTaskSummaries(tasks, limit) };
  }
  return fitToResponseSize(summary, tasks, limit, thresholds.maxResponseBytes);
}

// ─── Entry Points ───────────────────────────────────────

/** Collect, filter and sort tasks without any limit */
export async function selectTasks(
  source: TaskSource,
  query: Omit<TaskQuery, "limit" | "summaryMode">,
  options: AnalyticsOptions = {}
): Promise<TaskDetail[]> {
  const now = options.now ?? new Date();
  const projects = await resolveProjects(source, query.projectIds);
  const tasks = await collectTasks(source, projects, {
    includeTimeTracking: query.includeTimeTracking,
    now,
  });
  return sortTasks(filterTasks(tasks, query), query.sortBy);
}

/** The kanboard_tasks listing */
export async function listTasks(
  source: TaskSource,
  query: TaskQuery,
  options: AnalyticsOptions = {}
): Promise<TasksResponse> {
  const now = options.now ?? new Date();
  const tasks = await selectTasks(source, query, { ...options, now });
  return shapeListing(tasks, query, now, options.thresholds);
}
