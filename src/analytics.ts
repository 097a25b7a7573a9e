/**
 * Trend analytics — historical metrics over a time window.
 *
 * Completion trends, cycle time, velocity, task aging, burndown and
 * project health, all recomputed per request from tasks created inside
 * the window. Completion here uses exact column names.
 */

import {
  ANALYSIS_KINDS,
  type AnalysisKind,
  type TimeRange,
} from "./config.js";
import { isCompletedColumnExact } from "./completion.js";
import type { TaskSource } from "./kanboard.js";
import { log } from "./logger.js";
import { selectTasks, type AnalyticsOptions, type TaskDetail } from "./tasks.js";
import {
  addDays,
  addMonths,
  addYears,
  daysBetween,
  formatDay,
  isoWeekKey,
  parseTimestamp,
  round1,
} from "./time.js";

// ─── Types ──────────────────────────────────────────────

export interface CompletionTrend {
  period: string;
  tasks_completed: number;
  tasks_created: number;
  completion_rate: number;
}

export interface CycleTimeMetric {
  column: string;
  project: string;
  avg_days: number;
  min_days: number;
  max_days: number;
  task_count: number;
  efficiency: "Good" | "Average" | "Poor";
}

export type EfficiencyRating = "Excellent" | "Good" | "Average" | "Poor";

export interface VelocityMetric {
  period: string;
  tasks_completed: number;
  story_points: number;
  estimated_hours: number;
  actual_hours: number;
  velocity_score: number;
  /** null when nothing in the period was estimated */
  efficiency_rating: EfficiencyRating | null;
}

export interface TaskAgingBand {
  age_group: string;
  task_count: number;
  percentage: number;
  avg_age_days: number;
  oldest_task?: string;
}

export interface BurndownPoint {
  date: string;
  remaining_tasks: number;
  completed_tasks: number;
  ideal_remaining: number;
  trend_projection: number;
}

export interface ProjectHealthMetric {
  project_id: string;
  project_name: string;
  health_score: number;
  completion_rate: number;
  on_time_delivery: number;
  team_utilisation: number;
  quality_indicator: "Excellent" | "Good" | "Fair" | "Poor";
  risk_level: "High" | "Medium" | "Low";
}

export type ProductivityTrend = "Improving" | "Declining" | "Stable";

export interface AnalyticsSummary {
  analysis_period: TimeRange;
  total_tasks: number;
  completed_tasks: number;
  overall_velocity: number;
  avg_cycle_time: number | null;
  productivity_trend: ProductivityTrend;
  key_insights: string[];
}

export interface AnalyticsResponse {
  summary: AnalyticsSummary;
  completion_trends?: CompletionTrend[];
  cycle_time_metrics?: CycleTimeMetric[];
  velocity_metrics?: VelocityMetric[];
  task_aging?: TaskAgingBand[];
  burndown_chart?: BurndownPoint[];
  project_health?: ProjectHealthMetric[];
}

export interface TrendQuery {
  projectIds: string[];
  timeRange: TimeRange;
  /** Computed in the order given; unknown kinds are ignored */
  analysisTypes: readonly string[];
  /** Accepted for compatibility; grouping is fixed per metric */
  groupBy?: string;
}

export const DEFAULT_ANALYSIS_KINDS: readonly AnalysisKind[] = [
  "completion_trends",
  "cycle_time",
  "velocity",
  "task_aging",
];

// ─── Window ─────────────────────────────────────────────

const RANGE_DAYS: Partial<Record<TimeRange, number>> = {
  "7_days": 7,
  "14_days": 14,
  "30_days": 30,
  "60_days": 60,
  "90_days": 90,
};

export function windowStart(range: TimeRange, now: Date): Date {
  const days = RANGE_DAYS[range];
  if (days !== undefined) return addDays(now, -days);
  return range === "6_months" ? addMonths(now, -6) : addYears(now, -1);
}

/** Day for short ranges, ISO week for 30-90 days, month beyond that */
export function periodKey(date: Date, range: TimeRange): string {
  switch (range) {
    case "7_days":
    case "14_days":
      return formatDay(date);
    case "30_days":
    case "60_days":
    case "90_days":
      return isoWeekKey(date);
    default:
      return formatDay(date).slice(0, 7);
  }
}

export function filterByWindow(tasks: readonly TaskDetail[], start: Date): TaskDetail[] {
  return tasks.filter((task) => {
    const created = parseTimestamp(task.dates.created);
    return created !== null && created >= start;
  });
}

function isCompleted(task: TaskDetail): boolean {
  return isCompletedColumnExact(task.status.column);
}

function average(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Days from start (or creation) to last modification; null when not positive */
function cycleDays(task: TaskDetail): number | null {
  const start = parseTimestamp(task.dates.started ?? task.dates.created);
  const end = parseTimestamp(task.dates.modified);
  if (!start || !end) return null;
  const days = daysBetween(start, end);
  return days > 0 ? days : null;
}

// ─── Metrics ────────────────────────────────────────────

export function analyzeCompletionTrends(
  tasks: readonly TaskDetail[],
  range: TimeRange
): CompletionTrend[] {
  const periods = new Map<string, CompletionTrend>();

  for (const task of tasks) {
    const created = parseTimestamp(task.dates.created);
    if (!created) continue;

    const key = periodKey(created, range);
    let trend = periods.get(key);
    if (!trend) {
      trend = { period: key, tasks_completed: 0, tasks_created: 0, completion_rate: 0 };
      periods.set(key, trend);
    }
    trend.tasks_created++;
    if (isCompleted(task)) trend.tasks_completed++;
  }

  const trends = [...periods.values()];
  for (const trend of trends) {
    trend.completion_rate =
      trend.tasks_created > 0 ? round1((trend.tasks_completed * 100) / trend.tasks_created) : 0;
  }
  return trends.sort((a, b) => a.period.localeCompare(b.period));
}

export function analyzeCycleTime(tasks: readonly TaskDetail[]): CycleTimeMetric[] {
  const groups = new Map<string, { project: string; column: string; days: number[] }>();

  for (const task of tasks) {
    if (!isCompleted(task)) continue;
    const days = cycleDays(task);
    if (days === null) continue;

    const key = `${task.project.id}\u0000${task.status.column}`;
    const group = groups.get(key);
    if (group) {
      group.days.push(days);
    } else {
      groups.set(key, { project: task.project.name, column: task.status.column, days: [days] });
    }
  }

  const metrics = [...groups.values()].map((group) => {
    const avg = average(group.days);
    const metric: CycleTimeMetric = {
      column: group.column,
      project: group.project,
      avg_days: round1(avg),
      min_days: round1(Math.min(...group.days)),
      max_days: round1(Math.max(...group.days)),
      task_count: group.days.length,
      efficiency: avg > 14 ? "Poor" : avg > 7 ? "Average" : "Good",
    };
    return { avg, metric };
  });

  return metrics.sort((a, b) => b.avg - a.avg).map((m) => m.metric);
}

export function efficiencyRating(estimated: number, actual: number): EfficiencyRating | null {
  if (estimated <= 0) return null;
  const ratio = actual / estimated;
  if (ratio <= 1.1) return "Excellent";
  if (ratio <= 1.3) return "Good";
  if (ratio <= 1.5) return "Average";
  return "Poor";
}

export function analyzeVelocity(tasks: readonly TaskDetail[], range: TimeRange): VelocityMetric[] {
  const periods = new Map<string, VelocityMetric>();

  for (const task of tasks) {
    if (!isCompleted(task)) continue;
    const modified = parseTimestamp(task.dates.modified);
    if (!modified) continue;

    const key = periodKey(modified, range);
    let metric = periods.get(key);
    if (!metric) {
      metric = {
        period: key,
        tasks_completed: 0,
        story_points: 0,
        estimated_hours: 0,
        actual_hours: 0,
        velocity_score: 0,
        efficiency_rating: null,
      };
      periods.set(key, metric);
    }

    metric.tasks_completed++;
    metric.story_points++;
    metric.estimated_hours += task.time_tracking?.estimated_hours ?? 0;
    metric.actual_hours += task.time_tracking?.spent_hours ?? 0;
  }

  const metrics = [...periods.values()];
  for (const metric of metrics) {
    metric.velocity_score = metric.tasks_completed;
    metric.efficiency_rating = efficiencyRating(metric.estimated_hours, metric.actual_hours);
  }
  return metrics.sort((a, b) => a.period.localeCompare(b.period));
}

const AGE_BANDS = [
  { label: "0-7 days", maxDays: 7 },
  { label: "8-14 days", maxDays: 14 },
  { label: "15-30 days", maxDays: 30 },
  { label: "31-60 days", maxDays: 60 },
  { label: "60+ days", maxDays: Number.POSITIVE_INFINITY },
] as const;

export function analyzeTaskAging(tasks: readonly TaskDetail[], now: Date): TaskAgingBand[] {
  const bands = AGE_BANDS.map((band) => ({ label: band.label, maxDays: band.maxDays, count: 0, avgAge: 0 }));
  let incomplete = 0;
  let oldest: { title: string; age: number } | null = null;

  for (const task of tasks) {
    if (isCompleted(task)) continue;
    incomplete++;

    const created = parseTimestamp(task.dates.created);
    if (!created) continue;
    const age = daysBetween(created, now);

    if (!oldest || age > oldest.age) oldest = { title: task.title, age };

    const band = bands.find((b) => age <= b.maxDays) ?? bands[bands.length - 1];
    band.count++;
    // running mean
    band.avgAge += (age - band.avgAge) / band.count;
  }

  return bands
    .filter((band) => band.count > 0)
    .sort((a, b) => a.avgAge - b.avgAge)
    .map((band) => ({
      age_group: band.label,
      task_count: band.count,
      percentage: round1((band.count * 100) / incomplete),
      avg_age_days: round1(band.avgAge),
      ...(band.label === "60+ days" && oldest && { oldest_task: oldest.title }),
    }));
}

/** Daily samples up to 60 days, weekly beyond */
function burndownStepDays(range: TimeRange): number {
  const days = RANGE_DAYS[range];
  return days !== undefined && days <= 60 ? 1 : 7;
}

export function generateBurndown(
  tasks: readonly TaskDetail[],
  range: TimeRange,
  now: Date
): BurndownPoint[] {
  const start = windowStart(range, now);
  const step = burndownStepDays(range);

  const samples: Date[] = [];
  for (let date = start; date <= now; date = addDays(date, step)) {
    samples.push(date);
  }
  if (samples.length === 0) return [];

  const created = tasks.map((task) => parseTimestamp(task.dates.created));
  const completedAt = tasks.map((task) =>
    isCompleted(task) ? parseTimestamp(task.dates.modified) : null
  );

  const existing = created.filter((c) => c !== null && c <= start).length;
  const points: BurndownPoint[] = [];

  samples.forEach((date, i) => {
    const createdSince = created.filter((c) => c !== null && c > start && c <= date).length;
    const completed = completedAt.filter((c) => c !== null && c <= date).length;
    const remaining = existing + createdSince - completed;

    const progress = samples.length > 1 ? i / (samples.length - 1) : 0;
    const previous: BurndownPoint | undefined = points[i - 1];
    const velocity = previous ? previous.remaining_tasks - remaining : 0;
    const projection = previous
      ? Math.max(0, remaining - velocity * (samples.length - i - 1))
      : remaining;

    points.push({
      date: formatDay(date),
      remaining_tasks: remaining,
      completed_tasks: completed,
      ideal_remaining: Math.floor(existing * (1 - progress)),
      trend_projection: projection,
    });
  });

  return points;
}

export function analyzeProjectHealth(tasks: readonly TaskDetail[]): ProjectHealthMetric[] {
  const projects = new Map<
    string,
    {
      name: string;
      total: number;
      completed: number;
      overdue: number;
      onTime: number;
      estimated: number;
      spent: number;
    }
  >();

  for (const task of tasks) {
    let stats = projects.get(task.project.id);
    if (!stats) {
      stats = { name: task.project.name, total: 0, completed: 0, overdue: 0, onTime: 0, estimated: 0, spent: 0 };
      projects.set(task.project.id, stats);
    }

    stats.total++;
    if (isCompleted(task)) {
      stats.completed++;
      const due = parseTimestamp(task.dates.due);
      const modified = parseTimestamp(task.dates.modified);
      if (due && modified && modified <= due) stats.onTime++;
    }
    if (task.is_overdue) stats.overdue++;
    stats.estimated += task.time_tracking?.estimated_hours ?? 0;
    stats.spent += task.time_tracking?.spent_hours ?? 0;
  }

  const health = [...projects.entries()].map(([id, stats]) => {
    const completionRate = stats.total > 0 ? (stats.completed * 100) / stats.total : 0;
    const onTime = stats.completed > 0 ? (stats.onTime * 100) / stats.completed : 0;
    const utilisation = stats.estimated > 0 ? Math.min(100, (stats.spent * 100) / stats.estimated) : 0;
    const score = completionRate * 0.4 + onTime * 0.3 + utilisation * 0.3;
    const overduePercent = stats.total > 0 ? (stats.overdue * 100) / stats.total : 0;

    const metric: ProjectHealthMetric = {
      project_id: id,
      project_name: stats.name,
      health_score: round1(score),
      completion_rate: round1(completionRate),
      on_time_delivery: round1(onTime),
      team_utilisation: round1(utilisation),
      quality_indicator: score >= 90 ? "Excellent" : score >= 75 ? "Good" : score >= 60 ? "Fair" : "Poor",
      risk_level:
        overduePercent > 30 || score < 50
          ? "High"
          : overduePercent > 15 || score < 70
            ? "Medium"
            : "Low",
    };
    return { score, metric };
  });

  return health.sort((a, b) => b.score - a.score).map((h) => h.metric);
}

// ─── Summary ────────────────────────────────────────────

/** Completions in the second half of the window against the first half */
export function productivityTrend(
  tasks: readonly TaskDetail[],
  start: Date,
  now: Date
): ProductivityTrend {
  const midpoint = new Date((start.getTime() + now.getTime()) / 2);
  let firstHalf = 0;
  let secondHalf = 0;

  for (const task of tasks) {
    if (!isCompleted(task)) continue;
    const modified = parseTimestamp(task.dates.modified);
    if (!modified || modified < start || modified > now) continue;
    if (modified < midpoint) firstHalf++;
    else secondHalf++;
  }

  if (firstHalf === 0) return secondHalf > 0 ? "Improving" : "Stable";
  const change = (secondHalf - firstHalf) / firstHalf;
  if (change > 0.2) return "Improving";
  if (change < -0.2) return "Declining";
  return "Stable";
}

export function generateSummary(
  tasks: readonly TaskDetail[],
  range: TimeRange,
  now: Date
): AnalyticsSummary {
  const completed = tasks.filter(isCompleted);
  const cycles = completed.map(cycleDays).filter((d): d is number => d !== null);

  const insights: string[] = [];
  if (tasks.length > 0) {
    const rate = (completed.length * 100) / tasks.length;
    if (rate > 80) insights.push("High completion rate indicates strong delivery performance");
    else if (rate < 50) insights.push("Low completion rate may indicate process bottlenecks");
  }

  return {
    analysis_period: range,
    total_tasks: tasks.length,
    completed_tasks: completed.length,
    overall_velocity: completed.length,
    avg_cycle_time: cycles.length > 0 ? round1(average(cycles)) : null,
    productivity_trend: productivityTrend(tasks, windowStart(range, now), now),
    key_insights: insights,
  };
}

// ─── Entry Points ───────────────────────────────────────

function isAnalysisKind(value: string): value is AnalysisKind {
  return ANALYSIS_KINDS.some((kind) => kind === value);
}

/** Window the tasks and compute every requested metric */
export function performAnalysis(
  tasks: readonly TaskDetail[],
  query: Pick<TrendQuery, "timeRange" | "analysisTypes">,
  options: AnalyticsOptions = {}
): AnalyticsResponse {
  const now = options.now ?? new Date();
  const windowed = filterByWindow(tasks, windowStart(query.timeRange, now));
  const kinds = query.analysisTypes.length > 0 ? query.analysisTypes : DEFAULT_ANALYSIS_KINDS;

  const response: AnalyticsResponse = {
    summary: generateSummary(windowed, query.timeRange, now),
  };

  for (const kind of kinds) {
    if (!isAnalysisKind(kind)) {
      log("debug", "ignoring unknown analysis type", { kind });
      continue;
    }
    switch (kind) {
      case "completion_trends":
        response.completion_trends = analyzeCompletionTrends(windowed, query.timeRange);
        break;
      case "cycle_time":
        response.cycle_time_metrics = analyzeCycleTime(windowed);
        break;
      case "velocity":
        response.velocity_metrics = analyzeVelocity(windowed, query.timeRange);
        break;
      case "task_aging":
        response.task_aging = analyzeTaskAging(windowed, now);
        break;
      case "burndown":
        response.burndown_chart = generateBurndown(windowed, query.timeRange, now);
        break;
      case "project_health":
        response.project_health = analyzeProjectHealth(windowed);
        break;
    }
  }

  return response;
}

/** The kanboard_analytics report */
export async function getTrendAnalytics(
  source: TaskSource,
  query: TrendQuery,
  options: AnalyticsOptions = {}
): Promise<AnalyticsResponse> {
  const now = options.now ?? new Date();
  const tasks = await selectTasks(
    source,
    {
      projectIds: query.projectIds,
      assigneeIds: [],
      statusFilter: "all",
      includeOverdue: true,
      includeTimeTracking: true,
      sortBy: "created",
    },
    { ...options, now }
  );
  return performAnalysis(tasks, query, { ...options, now });
}
