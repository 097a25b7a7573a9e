/**
 * Priority analysis — workload, urgency, bottlenecks and recommendations.
 *
 * Works on the full task set for the selected projects (every status,
 * overdue included, uncapped) and scores it against one evaluation instant.
 */

import {
  DEFAULT_THRESHOLDS,
  type AnalyticsThresholds,
  type TimeHorizon,
} from "./config.js";
import type { TaskSource } from "./kanboard.js";
import { log } from "./logger.js";
import { selectTasks, type AnalyticsOptions, type TaskDetail } from "./tasks.js";
import { addDays, addMonths, daysBetween, parseTimestamp, round1 } from "./time.js";

// ─── Types ──────────────────────────────────────────────

export type WorkloadStatus =
  | "severely_overloaded"
  | "overloaded"
  | "at_capacity"
  | "normal"
  | "underutilized";

export interface UserWorkload {
  user_id: string;
  username: string;
  name: string;
  assigned_tasks: number;
  overdue_tasks: number;
  total_estimated_hours: number;
  /** Rounded percentage, e.g. "85%" */
  capacity_utilization: string;
  utilization_percent: number;
  status: WorkloadStatus;
}

export interface UrgentItem {
  task_id: string;
  title: string;
  urgency_score: number;
  reason: string;
  project: string;
  days_overdue?: number;
}

export interface Bottleneck {
  column: string;
  project: string;
  stuck_tasks: number;
  avg_wait_time_days: number;
  task_ids: string[];
}

export type RecommendationType = "priority" | "workload" | "delegation" | "process";

export interface Recommendation {
  type: RecommendationType;
  message: string;
  task_ids?: string[];
  suggested_assignee?: string;
  affected_tasks?: string[];
  confidence: number;
}

export interface PrioritiesAnalysis {
  requesting_user?: UserWorkload;
  team_workloads: UserWorkload[];
  urgent_items: UrgentItem[];
  bottlenecks: Bottleneck[];
}

export interface PrioritiesResponse {
  analysis: PrioritiesAnalysis;
  recommendations?: Recommendation[];
}

export interface PrioritiesQuery {
  /** Target user; the authenticated user when omitted */
  userId?: string;
  projectIds: string[];
  timeHorizon: TimeHorizon;
  includeRecommendations: boolean;
}

// ─── Workload ───────────────────────────────────────────

export function workloadStatus(utilization: number): WorkloadStatus {
  if (utilization > 120) return "severely_overloaded";
  if (utilization > 100) return "overloaded";
  if (utilization > 80) return "at_capacity";
  if (utilization > 50) return "normal";
  return "underutilized";
}

/** Per-assignee workload, most estimated hours first */
export function analyzeTeamWorkloads(
  tasks: readonly TaskDetail[],
  thresholds: AnalyticsThresholds = DEFAULT_THRESHOLDS
): UserWorkload[] {
  const byUser = new Map<string, UserWorkload>();

  for (const task of tasks) {
    if (!task.assignee) continue;

    let workload = byUser.get(task.assignee.id);
    if (!workload) {
      workload = {
        user_id: task.assignee.id,
        username: task.assignee.username,
        name: task.assignee.name,
        assigned_tasks: 0,
        overdue_tasks: 0,
        total_estimated_hours: 0,
        capacity_utilization: "0%",
        utilization_percent: 0,
        status: "underutilized",
      };
      byUser.set(task.assignee.id, workload);
    }

    workload.assigned_tasks++;
    if (task.is_overdue) workload.overdue_tasks++;
    workload.total_estimated_hours += task.time_tracking?.estimated_hours ?? 0;
  }

  const workloads = [...byUser.values()];
  for (const workload of workloads) {
    const utilization = (workload.total_estimated_hours / thresholds.weeklyCapacityHours) * 100;
    workload.utilization_percent = round1(utilization);
    workload.capacity_utilization = `${Math.round(utilization)}%`;
    workload.status = workloadStatus(utilization);
  }

  return workloads.sort((a, b) => b.total_estimated_hours - a.total_estimated_hours);
}

const INTEGER = /^[+-]?\d+$/;

/** Same user id, tolerating "7" vs "007" */
export function matchesUserId(a: string, b: string): boolean {
  if (a === b) return true;
  return INTEGER.test(a) && INTEGER.test(b) && BigInt(a) === BigInt(b);
}

// ─── Urgency ────────────────────────────────────────────

export function horizonLimit(horizon: TimeHorizon, now: Date): Date {
  switch (horizon) {
    case "today":
      return addDays(now, 1);
    case "month":
      return addMonths(now, 1);
    default:
      return addDays(now, 7);
  }
}

const PRIORITY_BONUS = { urgent: 25, high: 15, normal: 5, low: 0 } as const;

export function calculateUrgencyScore(task: TaskDetail, now: Date, limit: Date): number {
  let score = 0;
  const due = parseTimestamp(task.dates.due);

  if (due) {
    score += 20;
    const days = task.days_until_due ?? Math.floor(daysBetween(now, due));

    if (task.is_overdue) {
      const daysOverdue = -days;
      score += 40;
      if (daysOverdue > 7) score += 30;
      else if (daysOverdue > 3) score += 20;
      else score += 10;
    } else if (due < limit) {
      const daysLeft = days;
      if (daysLeft <= 1) score += 25;
      else if (daysLeft <= 3) score += 15;
      else if (daysLeft <= 7) score += 10;
    }
  }

  score += PRIORITY_BONUS[task.priority];

  if (!task.assignee) score += 15;

  return score;
}

export function urgencyReason(task: TaskDetail): string {
  const days = task.days_until_due;

  if (task.is_overdue) {
    if (days === null) return "Task is overdue";
    const overdue = -days;
    return overdue === 1 ? "Overdue by 1 day" : `Overdue by ${overdue} days`;
  }

  if (days !== null) {
    if (days === 0) return "Due today";
    if (days === 1) return "Due tomorrow";
    if (days <= 3) return `Due in ${days} days`;
  }

  if (task.priority === "urgent") return "marked as urgent priority";
  if (task.priority === "high") return "marked as high priority";
  if (!task.assignee) return "unassigned task needs attention";

  return "High priority task";
}

export function findUrgentItems(
  tasks: readonly TaskDetail[],
  horizon: TimeHorizon,
  now: Date,
  thresholds: AnalyticsThresholds = DEFAULT_THRESHOLDS
): UrgentItem[] {
  const limit = horizonLimit(horizon, now);
  const items: UrgentItem[] = [];

  for (const task of tasks) {
    const score = calculateUrgencyScore(task, now, limit);
    if (score < thresholds.urgencyCutoff) continue;

    items.push({
      task_id: task.id,
      title: task.title,
      urgency_score: score,
      reason: urgencyReason(task),
      project: task.project.name,
      ...(task.is_overdue &&
        task.days_until_due !== null && { days_overdue: -task.days_until_due }),
    });
  }

  return items
    .sort((a, b) => b.urgency_score - a.urgency_score)
    .slice(0, thresholds.maxUrgentItems);
}

// ─── Bottlenecks ────────────────────────────────────────

export function findBottlenecks(
  tasks: readonly TaskDetail[],
  now: Date,
  thresholds: AnalyticsThresholds = DEFAULT_THRESHOLDS
): Bottleneck[] {
  const { minColumnTasks, stalledAfterDays, minStalledTasks, minAvgWaitDays } =
    thresholds.bottleneck;

  const groups = new Map<string, { project: string; column: string; tasks: TaskDetail[] }>();
  for (const task of tasks) {
    const key = `${task.project.id}\u0000${task.status.column}`;
    const group = groups.get(key);
    if (group) {
      group.tasks.push(task);
    } else {
      groups.set(key, { project: task.project.name, column: task.status.column, tasks: [task] });
    }
  }

  const bottlenecks: { entry: Bottleneck; avgWait: number }[] = [];

  for (const group of groups.values()) {
    if (group.tasks.length < minColumnTasks) continue;

    let totalWait = 0;
    const stalled: string[] = [];
    for (const task of group.tasks) {
      const modified = parseTimestamp(task.dates.modified);
      if (!modified) continue;
      const wait = daysBetween(modified, now);
      if (wait > stalledAfterDays) {
        totalWait += wait;
        stalled.push(task.id);
      }
    }

    if (stalled.length < minStalledTasks) continue;
    const avgWait = totalWait / stalled.length;
    if (avgWait <= minAvgWaitDays) continue;

    bottlenecks.push({
      avgWait,
      entry: {
        column: group.column,
        project: group.project,
        stuck_tasks: stalled.length,
        avg_wait_time_days: round1(avgWait),
        task_ids: stalled,
      },
    });
  }

  return bottlenecks.sort((a, b) => b.avgWait - a.avgWait).map((b) => b.entry);
}

// ─── Recommendations ────────────────────────────────────

function isOverloaded(status: WorkloadStatus): boolean {
  return status === "overloaded" || status === "severely_overloaded";
}

export function generateRecommendations(analysis: PrioritiesAnalysis): Recommendation[] {
  const recommendations: Recommendation[] = [];

  const top = analysis.urgent_items[0];
  if (top) {
    recommendations.push({
      type: "priority",
      message: `Focus on '${top.title}' first - urgency score: ${top.urgency_score} (${top.reason})`,
      task_ids: [top.task_id],
      confidence: 0.92,
    });
  }

  const me = analysis.requesting_user;
  if (me && isOverloaded(me.status)) {
    recommendations.push({
      type: "workload",
      message: `Your workload is ${me.status} (${me.capacity_utilization} utilization) - consider delegating or deferring lower priority tasks`,
      confidence: 0.85,
    });
  }

  if (analysis.team_workloads.length > 1) {
    const overloaded = analysis.team_workloads.filter((w) => isOverloaded(w.status));
    const available = analysis.team_workloads.filter(
      (w) => w.status === "underutilized" || w.status === "normal"
    );
    // Workloads are ordered by hours, so the ends are the extremes
    const from = overloaded[0];
    const to = available[available.length - 1];
    if (from && to) {
      recommendations.push({
        type: "delegation",
        message: `Consider redistributing tasks from ${from.name} (${from.capacity_utilization}) to ${to.name} (${to.capacity_utilization})`,
        suggested_assignee: to.user_id,
        confidence: 0.78,
      });
    }
  }

  for (const bottleneck of analysis.bottlenecks) {
    if (bottleneck.stuck_tasks < 3) continue;
    recommendations.push({
      type: "process",
      message: `'${bottleneck.column}' column in ${bottleneck.project} has bottleneck - ${bottleneck.stuck_tasks} tasks waiting ${bottleneck.avg_wait_time_days.toFixed(1)} days on average`,
      affected_tasks: bottleneck.task_ids,
      confidence: 0.85,
    });
  }

  return recommendations;
}

// ─── Entry Points ───────────────────────────────────────

export function analyzeWorkload(
  tasks: readonly TaskDetail[],
  userId: string,
  horizon: TimeHorizon,
  options: AnalyticsOptions = {}
): PrioritiesAnalysis {
  const now = options.now ?? new Date();
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;

  const team = analyzeTeamWorkloads(tasks, thresholds);
  const requesting = team.find((w) => matchesUserId(w.user_id, userId));

  return {
    ...(requesting && { requesting_user: requesting }),
    team_workloads: team,
    urgent_items: findUrgentItems(tasks, horizon, now, thresholds),
    bottlenecks: findBottlenecks(tasks, now, thresholds),
  };
}

/** The kanboard_priorities analysis */
export async function getPriorities(
  source: TaskSource,
  query: PrioritiesQuery,
  options: AnalyticsOptions = {}
): Promise<PrioritiesResponse> {
  const now = options.now ?? new Date();
  const userId = query.userId || String((await source.fetchCurrentUser()).id);

  const tasks = await selectTasks(
    source,
    {
      projectIds: query.projectIds,
      assigneeIds: [],
      statusFilter: "all",
      includeOverdue: true,
      includeTimeTracking: true,
      sortBy: "due_date",
    },
    { ...options, now }
  );

  const analysis = analyzeWorkload(tasks, userId, query.timeHorizon, { ...options, now });
  log("debug", "priority analysis complete", {
    tasks: tasks.length,
    urgent: analysis.urgent_items.length,
    bottlenecks: analysis.bottlenecks.length,
  });

  return {
    analysis,
    ...(query.includeRecommendations && {
      recommendations: generateRecommendations(analysis),
    }),
  };
}
