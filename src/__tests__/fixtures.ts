import type {
  KanboardColumn,
  KanboardProject,
  KanboardSwimlane,
  KanboardTask,
  KanboardUser,
  TaskSource,
} from "../kanboard.js";
import { DAY_MS } from "../time.js";
import type { TaskDetail } from "../tasks.js";

/** Fixed evaluation instant for every test */
export const NOW = new Date("2024-03-15T12:00:00Z");

export const BASE_URL = "https://kanboard.test";

export function daysFromNow(days: number): Date {
  return new Date(NOW.getTime() + days * DAY_MS);
}

export function project(id: number, name: string, isActive = true): KanboardProject {
  return {
    id,
    name,
    description: `${name} board`,
    is_active: isActive,
    owner_id: 1,
    owner_name: "admin",
  };
}

export const COLUMNS: KanboardColumn[] = [
  { id: 1, title: "Backlog", position: 1, task_limit: 0 },
  { id: 2, title: "In Progress", position: 2, task_limit: 3 },
  { id: 3, title: "Done", position: 3, task_limit: 0 },
];

export const SWIMLANES: KanboardSwimlane[] = [
  { id: 1, name: "Default swimlane", position: 1, is_active: true },
];

export const USERS: KanboardUser[] = [
  { id: 7, username: "alice", name: "Alice", role: "project-manager" },
  { id: 8, username: "bob", name: "Bob", role: "project-member" },
];

export function rawTask(id: number, overrides: Partial<KanboardTask> = {}): KanboardTask {
  return {
    id,
    title: `Task ${id}`,
    description: "",
    project_id: 1,
    column_id: 1,
    swimlane_id: 1,
    owner_id: 0,
    category_id: 0,
    priority: 1,
    is_active: true,
    date_creation: daysFromNow(-5),
    date_due: null,
    date_modification: daysFromNow(-1),
    date_started: null,
    date_completed: null,
    time_estimated: 0,
    time_spent: 0,
    ...overrides,
  };
}

export interface FakeBoard {
  projects: KanboardProject[];
  tasks: Record<number, KanboardTask[]>;
  columns?: KanboardColumn[];
  users?: KanboardUser[];
  me?: KanboardUser;
  /** Project ids whose task fetch rejects */
  failing?: Record<number, Error>;
}

/** In-memory TaskSource that records every call it receives */
export class FakeTaskSource implements TaskSource {
  readonly baseUrl = BASE_URL;
  readonly calls: string[] = [];

  constructor(private readonly board: FakeBoard) {}

  async fetchTasks(projectId: number): Promise<KanboardTask[]> {
    this.calls.push(`tasks:${projectId}`);
    const failure = this.board.failing?.[projectId];
    if (failure) throw failure;
    return this.board.tasks[projectId] ?? [];
  }

  async fetchColumns(projectId: number): Promise<KanboardColumn[]> {
    this.calls.push(`columns:${projectId}`);
    return this.board.columns ?? COLUMNS;
  }

  async fetchSwimlanes(projectId: number): Promise<KanboardSwimlane[]> {
    this.calls.push(`swimlanes:${projectId}`);
    return SWIMLANES;
  }

  async fetchProjectUsers(projectId: number): Promise<KanboardUser[]> {
    this.calls.push(`users:${projectId}`);
    return this.board.users ?? USERS;
  }

  async fetchAccessibleProjects(): Promise<KanboardProject[]> {
    this.calls.push("projects");
    return this.board.projects;
  }

  async fetchCurrentUser(): Promise<KanboardUser> {
    this.calls.push("me");
    return this.board.me ?? USERS[0];
  }
}

/** A normalized task record with sensible defaults */
export function detail(id: string, overrides: Partial<TaskDetail> = {}): TaskDetail {
  return {
    id,
    title: `Task ${id}`,
    description: "",
    project: { id: "1", name: "Website" },
    assignee: null,
    status: { column: "Backlog", swimlane: "Default swimlane" },
    dates: {
      created: "2024-03-10T12:00:00Z",
      due: null,
      modified: "2024-03-14T12:00:00Z",
      started: null,
    },
    time_tracking: { estimated_hours: 0, spent_hours: 0, remaining_hours: 0 },
    priority: "normal",
    category: "",
    tags: [],
    url: `${BASE_URL}/?controller=TaskViewController&action=show&task_id=${id}&project_id=1`,
    is_overdue: false,
    days_until_due: null,
    ...overrides,
  };
}

export const ALICE = { id: "7", username: "alice", name: "Alice" };
export const BOB = { id: "8", username: "bob", name: "Bob" };
