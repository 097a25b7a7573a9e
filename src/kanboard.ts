/**
 * Kanboard JSON-RPC client.
 *
 * Speaks Kanboard's jsonrpc.php endpoint with HTTP Basic auth and maps its
 * loosely typed results into the records the analytics work on. Nothing is
 * retried; the first failure is thrown to the caller.
 */

import { z } from "zod";
import type { KanboardConfig } from "./config.js";
import {
  candidate,
  kbBoolean,
  kbNumber,
  kbString,
  kbTime,
  oneOf,
} from "./decode.js";
import { log } from "./logger.js";

// ─── Records ────────────────────────────────────────────

const projectSchema = z.object({
  id: kbNumber,
  name: kbString,
  description: kbString,
  is_active: kbBoolean,
  owner_id: kbNumber,
  owner_name: kbString,
});

const taskSchema = z.object({
  id: kbNumber,
  title: kbString,
  description: kbString,
  project_id: kbNumber,
  column_id: kbNumber,
  swimlane_id: kbNumber,
  owner_id: kbNumber,
  category_id: kbNumber,
  priority: kbNumber,
  is_active: kbBoolean,
  date_creation: kbTime,
  date_due: kbTime,
  date_modification: kbTime,
  date_started: kbTime,
  date_completed: kbTime,
  time_estimated: kbNumber,
  time_spent: kbNumber,
});

const columnSchema = z.object({
  id: kbNumber,
  title: kbString,
  position: kbNumber,
  task_limit: kbNumber,
});

const swimlaneSchema = z.object({
  id: kbNumber,
  name: kbString,
  position: kbNumber,
  is_active: kbBoolean,
});

const userSchema = z.object({
  id: kbNumber,
  username: kbString,
  name: kbString,
  role: kbString,
});

export type KanboardProject = z.output<typeof projectSchema>;
export type KanboardTask = z.output<typeof taskSchema>;
export type KanboardColumn = z.output<typeof columnSchema>;
export type KanboardSwimlane = z.output<typeof swimlaneSchema>;
export type KanboardUser = z.output<typeof userSchema>;

/** Upstream data the analytics consume */
export interface TaskSource {
  /** Kanboard base URL, used to build task links */
  readonly baseUrl: string;
  fetchTasks(projectId: number): Promise<KanboardTask[]>;
  fetchColumns(projectId: number): Promise<KanboardColumn[]>;
  fetchSwimlanes(projectId: number): Promise<KanboardSwimlane[]>;
  fetchProjectUsers(projectId: number): Promise<KanboardUser[]>;
  fetchAccessibleProjects(): Promise<KanboardProject[]>;
  fetchCurrentUser(): Promise<KanboardUser>;
}

export class KanboardApiError extends Error {
  constructor(
    message: string,
    readonly method: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "KanboardApiError";
  }
}

// ─── Project Users ──────────────────────────────────────

function userFromMapEntry(key: string, username: string): KanboardUser {
  const id = /^-?\d+$/.test(key) ? Number(key) : 0;
  return { id, username, name: username, role: "" };
}

/**
 * getProjectUsers answers with a list of user objects on some installs and
 * an `{ "<id>": "<name>" }` map on others.
 */
const PROJECT_USER_SHAPES = [
  candidate("user list", z.array(userSchema), (users) => users),
  candidate("string map", z.record(z.string()), (map) =>
    Object.entries(map).map(([key, name]) => userFromMapEntry(key, name))
  ),
  candidate("generic map", z.record(z.unknown()), (map) =>
    Object.entries(map).map(([key, value]) =>
      userFromMapEntry(
        key,
        typeof value === "string" ? value : JSON.stringify(value) ?? String(value)
      )
    )
  ),
];

export function decodeProjectUsers(result: unknown): KanboardUser[] {
  const decoded = oneOf(result, PROJECT_USER_SHAPES);
  if (!decoded.ok) {
    throw new KanboardApiError(
      `failed to decode project users (${decoded.errors.join("; ")})`,
      "getProjectUsers"
    );
  }
  if (decoded.shape !== "user list") {
    log("debug", "project users decoded from fallback shape", { shape: decoded.shape });
  }
  return decoded.value;
}

// ─── Client ─────────────────────────────────────────────

const rpcResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z
    .object({ code: z.number().optional(), message: z.string() })
    .nullable()
    .optional(),
});

export type FetchLike = (
  input: string,
  init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal }
) => Promise<{ ok: boolean; status: number; statusText: string; json(): Promise<unknown> }>;

function parseResult<S extends z.ZodTypeAny>(
  method: string,
  schema: S,
  result: unknown
): z.output<S> {
  const parsed = schema.safeParse(result);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new KanboardApiError(
      `unexpected ${method} result: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid"}`,
      method
    );
  }
  return parsed.data;
}

export function createKanboardClient(
  config: KanboardConfig,
  fetchImpl: FetchLike = fetch
): TaskSource {
  const endpoint = `${config.url}/jsonrpc.php`;
  const auth = `Basic ${Buffer.from(`${config.username}:${config.token}`).toString("base64")}`;
  let requestId = 0;

  async function call(method: string, params?: Record<string, unknown>): Promise<unknown> {
    const response = await fetchImpl(endpoint, {
      method: "POST",
      headers: { Authorization: auth, "Content-Type": "application/json" },
      body: JSON.stringify({ jsonrpc: "2.0", method, id: ++requestId, params }),
      signal: AbortSignal.timeout(config.timeoutMs),
    });
    if (!response.ok) {
      throw new KanboardApiError(
        `HTTP error: ${response.status} ${response.statusText}`.trim(),
        method
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new KanboardApiError(`malformed JSON-RPC response to ${method}`, method, {
        cause: error,
      });
    }

    const body = rpcResponseSchema.safeParse(payload);
    if (!body.success) {
      throw new KanboardApiError(`malformed JSON-RPC response to ${method}`, method);
    }
    if (body.data.error) {
      throw new KanboardApiError(`JSON-RPC error: ${body.data.error.message}`, method);
    }
    return body.data.result;
  }

  return {
    baseUrl: config.url,

    async fetchTasks(projectId) {
      const result = await call("getAllTasks", { project_id: projectId });
      return parseResult("getAllTasks", z.array(taskSchema), result);
    },

    async fetchColumns(projectId) {
      const result = await call("getColumns", { project_id: projectId });
      return parseResult("getColumns", z.array(columnSchema), result);
    },

    async fetchSwimlanes(projectId) {
      const result = await call("getAllSwimlanes", { project_id: projectId });
      return parseResult("getAllSwimlanes", z.array(swimlaneSchema), result);
    },

    async fetchProjectUsers(projectId) {
      return decodeProjectUsers(await call("getProjectUsers", { project_id: projectId }));
    },

    async fetchAccessibleProjects() {
      const result = await call("getMyProjects");
      return parseResult("getMyProjects", z.array(projectSchema), result);
    },

    async fetchCurrentUser() {
      const result = await call("getMe");
      return parseResult("getMe", userSchema, result);
    },
  };
}
