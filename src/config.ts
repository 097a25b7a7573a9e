/**
 * Kanboard Insights configuration — credentials plus analytics thresholds.
 *
 * Credentials come from the environment (KANBOARD_URL, KANBOARD_USERNAME,
 * KANBOARD_TOKEN), optionally layered over a JSON file named by
 * KANBOARD_INSIGHTS_CONFIG. The environment always wins over the file.
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { z } from "zod";

// ─── Vocabulary ──────────────────────────────────────────

/** Column names that mark a task as finished */
export const COMPLETED_COLUMNS = [
  "Done",
  "Completed",
  "Closed",
  "Finished",
] as const;

export const TASK_STATUS_FILTERS = ["active", "completed", "all"] as const;

export type TaskStatusFilter = (typeof TASK_STATUS_FILTERS)[number];

export const SORT_KEYS = ["due_date", "priority", "created"] as const;

/** Priority tiers, lowest first (index = Kanboard's numeric priority) */
export const PRIORITY_TIERS = ["low", "normal", "high", "urgent"] as const;

export type PriorityTier = (typeof PRIORITY_TIERS)[number];

export const TIME_HORIZONS = ["today", "week", "month"] as const;

export type TimeHorizon = (typeof TIME_HORIZONS)[number];

export const TIME_RANGES = [
  "7_days",
  "14_days",
  "30_days",
  "60_days",
  "90_days",
  "6_months",
  "1_year",
] as const;

export type TimeRange = (typeof TIME_RANGES)[number];

export const ANALYSIS_KINDS = [
  "completion_trends",
  "cycle_time",
  "velocity",
  "task_aging",
  "burndown",
  "project_health",
] as const;

export type AnalysisKind = (typeof ANALYSIS_KINDS)[number];

// ─── Analytics Thresholds ────────────────────────────────

export interface BottleneckThresholds {
  /** Tasks a column must hold before it is considered */
  minColumnTasks: number;
  /** A task counts as stalled once unmodified for longer than this */
  stalledAfterDays: number;
  /** Stalled tasks needed to report the column */
  minStalledTasks: number;
  /** Average wait of the stalled tasks must exceed this */
  minAvgWaitDays: number;
}

export interface AnalyticsThresholds {
  /** Hours of work one person is expected to carry per week */
  weeklyCapacityHours: number;
  /** Serialized detail-mode task listing must fit in this many bytes */
  maxResponseBytes: number;
  /** Hard ceiling on `limit` for detail-mode listings */
  detailLimitCeiling: number;
  /** Hard ceiling on `limit` for summary-mode listings */
  summaryLimitCeiling: number;
  /** Minimum urgency score for a task to be reported as urgent */
  urgencyCutoff: number;
  maxUrgentItems: number;
  bottleneck: BottleneckThresholds;
}

export const DEFAULT_THRESHOLDS: AnalyticsThresholds = {
  weeklyCapacityHours: 40,
  maxResponseBytes: 200 * 1024,
  detailLimitCeiling: 100,
  summaryLimitCeiling: 200,
  urgencyCutoff: 70,
  maxUrgentItems: 10,
  bottleneck: {
    minColumnTasks: 3,
    stalledAfterDays: 2,
    minStalledTasks: 3,
    minAvgWaitDays: 3,
  },
};

export type ThresholdOverrides = Partial<Omit<AnalyticsThresholds, "bottleneck">> & {
  bottleneck?: Partial<BottleneckThresholds>;
};

/** Merge overrides over the defaults */
export function resolveThresholds(
  overrides: ThresholdOverrides = {}
): AnalyticsThresholds {
  return {
    ...DEFAULT_THRESHOLDS,
    ...overrides,
    bottleneck: { ...DEFAULT_THRESHOLDS.bottleneck, ...overrides.bottleneck },
  };
}

// ─── Config Types ────────────────────────────────────────

export interface KanboardConfig {
  url: string;
  username: string;
  token: string;
  timeoutMs: number;
}

export interface InsightsConfig {
  kanboard: KanboardConfig;
  thresholds: AnalyticsThresholds;
}

const positiveNumber = z.coerce.number().positive();

/** Room for the summary of an empty listing, whatever its counts */
export const MIN_RESPONSE_BYTES = 1024;

const thresholdsSchema = z
  .object({
    weeklyCapacityHours: positiveNumber,
    maxResponseBytes: z.coerce
      .number()
      .min(MIN_RESPONSE_BYTES, `maxResponseBytes must be at least ${MIN_RESPONSE_BYTES}`),
    detailLimitCeiling: positiveNumber,
    summaryLimitCeiling: positiveNumber,
    urgencyCutoff: z.number().nonnegative(),
    maxUrgentItems: positiveNumber,
    bottleneck: z
      .object({
        minColumnTasks: positiveNumber,
        stalledAfterDays: z.number().nonnegative(),
        minStalledTasks: positiveNumber,
        minAvgWaitDays: z.number().nonnegative(),
      })
      .partial(),
  })
  .partial();

const fileSchema = z.object({
  kanboard: z
    .object({
      url: z.string(),
      username: z.string(),
      token: z.string(),
      timeoutMs: positiveNumber,
    })
    .partial()
    .optional(),
  thresholds: thresholdsSchema.optional(),
});

const kanboardSchema = z.object({
  url: z
    .string({ required_error: "KANBOARD_URL is required" })
    .url("KANBOARD_URL must be a valid URL"),
  username: z
    .string({ required_error: "KANBOARD_USERNAME is required" })
    .min(1, "KANBOARD_USERNAME is required"),
  token: z
    .string({ required_error: "KANBOARD_TOKEN is required" })
    .min(1, "KANBOARD_TOKEN is required"),
  timeoutMs: positiveNumber.default(30_000),
});

// ─── Config Loading ──────────────────────────────────────

let _config: InsightsConfig | null = null;

async function readConfigFile(
  path: string | undefined
): Promise<z.infer<typeof fileSchema>> {
  if (!path) return {};
  if (!existsSync(path)) {
    throw new Error(`Config file not found: ${path}`);
  }
  const content = await readFile(path, "utf-8");
  return fileSchema.parse(JSON.parse(content));
}

/** Build config from an environment map (and the file it points at) */
export async function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): Promise<InsightsConfig> {
  const file = await readConfigFile(env.KANBOARD_INSIGHTS_CONFIG);

  const parsed = kanboardSchema.safeParse({
    url: env.KANBOARD_URL ?? file.kanboard?.url,
    username: env.KANBOARD_USERNAME ?? file.kanboard?.username,
    token: env.KANBOARD_TOKEN ?? file.kanboard?.token,
    timeoutMs: env.KANBOARD_TIMEOUT_MS ?? file.kanboard?.timeoutMs,
  });
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => i.message).join("; ");
    throw new Error(`Invalid Kanboard configuration: ${problems}`);
  }

  return {
    kanboard: { ...parsed.data, url: parsed.data.url.replace(/\/+$/, "") },
    thresholds: resolveThresholds(file.thresholds),
  };
}

/** Load config once per process */
export async function getConfig(): Promise<InsightsConfig> {
  if (_config) return _config;
  _config = await loadConfig();
  return _config;
}
