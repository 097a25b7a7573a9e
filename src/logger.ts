/**
 * Structured logging for Kanboard tool execution.
 *
 * Logs go to stderr; stdout belongs to the MCP JSON-RPC stream.
 * The minimum level comes from LOG_LEVEL (default "info").
 */

// ─── Types ──────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  tool?: string;
  duration_ms?: number;
  message: string;
  context?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Calls slower than this are logged as warnings */
export const SLOW_CALL_MS = 1000;

// ─── Logger ─────────────────────────────────────────────

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

const envLevel = process.env.LOG_LEVEL;
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value) ?? String(value);
}

function formatEntry(entry: LogEntry): string {
  const parts = [entry.timestamp, entry.level.toUpperCase().padEnd(5)];

  if (entry.tool) {
    parts.push(`[${entry.tool}]`);
  }

  parts.push(entry.message);

  if (entry.duration_ms !== undefined) {
    parts.push(`(${entry.duration_ms}ms)`);
  }

  for (const [key, value] of Object.entries(entry.context ?? {})) {
    parts.push(`${key}=${formatValue(value)}`);
  }

  return parts.join(" ");
}

function emit(entry: LogEntry): void {
  if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[minLevel]) return;
  console.error(formatEntry(entry));
}

export function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>
): void {
  emit({ timestamp: new Date().toISOString(), level, message, context });
}

export function logTool(
  tool: string,
  level: LogLevel,
  message: string,
  duration_ms?: number,
  context?: Record<string, unknown>
): void {
  emit({
    timestamp: new Date().toISOString(),
    level,
    tool,
    duration_ms,
    message,
    context,
  });
}

// ─── Tool Metrics ───────────────────────────────────────

interface ToolMetrics {
  calls: number;
  errors: number;
  totalMs: number;
  lastCallAt: string | null;
}

const metrics = new Map<string, ToolMetrics>();

export function recordToolCall(
  tool: string,
  durationMs: number,
  isError: boolean
): void {
  const existing = metrics.get(tool) ?? {
    calls: 0,
    errors: 0,
    totalMs: 0,
    lastCallAt: null,
  };

  existing.calls++;
  if (isError) existing.errors++;
  existing.totalMs += durationMs;
  existing.lastCallAt = new Date().toISOString();

  metrics.set(tool, existing);
}

export function getToolMetrics(): Record<string, ToolMetrics & { avgMs: number }> {
  const result: Record<string, ToolMetrics & { avgMs: number }> = {};
  for (const [tool, m] of metrics) {
    result[tool] = {
      ...m,
      avgMs: m.calls > 0 ? Math.round(m.totalMs / m.calls) : 0,
    };
  }
  return result;
}

/**
 * Run a tool handler, recording its timing in the metrics table.
 * Errors are logged and rethrown unchanged.
 */
export async function withLogging<T>(
  toolName: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    const duration = Date.now() - start;
    recordToolCall(toolName, duration, false);
    if (duration > SLOW_CALL_MS) {
      logTool(toolName, "warn", "slow execution", duration);
    } else {
      logTool(toolName, "debug", "completed", duration);
    }
    return result;
  } catch (error) {
    const duration = Date.now() - start;
    recordToolCall(toolName, duration, true);
    logTool(
      toolName,
      "error",
      error instanceof Error ? error.message : String(error),
      duration
    );
    throw error;
  }
}
