/**
 * Board overview — projects with their columns, swimlanes, members and
 * per-column task counts.
 */

import type { KanboardProject, TaskSource } from "./kanboard.js";
import { collectOrThrow, fanOut } from "./pool.js";
import type { UserInfo } from "./tasks.js";

export interface ColumnInfo {
  id: string;
  title: string;
  position: number;
  task_limit: number;
}

export interface SwimlaneInfo {
  id: string;
  name: string;
  position: number;
  is_active: boolean;
}

export interface ProjectUser {
  id: string;
  username: string;
  name: string;
  role: string;
}

export interface ProjectOverview {
  id: string;
  name: string;
  description: string;
  is_active: boolean;
  owner: string;
  columns: ColumnInfo[];
  swimlanes: SwimlaneInfo[];
  /** Task count per column title */
  task_counts?: Record<string, number>;
  users: ProjectUser[];
}

export interface OverviewSummary {
  total_projects: number;
  active_projects: number;
  inactive_projects: number;
  total_tasks?: number;
}

export interface OverviewResponse {
  summary: OverviewSummary;
  projects: ProjectOverview[];
  user_info: UserInfo;
}

export interface OverviewQuery {
  includeTaskCounts?: boolean;
  includeInactiveProjects?: boolean;
}

async function buildProjectOverview(
  source: TaskSource,
  project: KanboardProject,
  includeTaskCounts: boolean
): Promise<ProjectOverview> {
  const [columns, swimlanes, users, tasks] = await Promise.all([
    source.fetchColumns(project.id),
    source.fetchSwimlanes(project.id),
    source.fetchProjectUsers(project.id),
    includeTaskCounts ? source.fetchTasks(project.id) : Promise.resolve(null),
  ]);

  let taskCounts: Record<string, number> | undefined;
  if (tasks) {
    const titles = new Map(columns.map((c) => [c.id, c.title]));
    taskCounts = {};
    for (const task of tasks) {
      const title = titles.get(task.column_id) ?? "";
      taskCounts[title] = (taskCounts[title] ?? 0) + 1;
    }
  }

  return {
    id: String(project.id),
    name: project.name,
    description: project.description,
    is_active: project.is_active,
    owner: project.owner_name,
    columns: columns.map((c) => ({
      id: String(c.id),
      title: c.title,
      position: c.position,
      task_limit: c.task_limit,
    })),
    swimlanes: swimlanes.map((s) => ({
      id: String(s.id),
      name: s.name,
      position: s.position,
      is_active: s.is_active,
    })),
    ...(taskCounts && { task_counts: taskCounts }),
    users: users.map((u) => ({
      id: String(u.id),
      username: u.username,
      name: u.name,
      role: u.role,
    })),
  };
}

export function summarizeProjects(
  projects: readonly ProjectOverview[],
  includeTaskCounts: boolean
): OverviewSummary {
  const active = projects.filter((p) => p.is_active).length;
  const summary: OverviewSummary = {
    total_projects: projects.length,
    active_projects: active,
    inactive_projects: projects.length - active,
  };

  if (includeTaskCounts) {
    summary.total_tasks = projects.reduce(
      (sum, p) => sum + Object.values(p.task_counts ?? {}).reduce((a, b) => a + b, 0),
      0
    );
  }
  return summary;
}

/** The kanboard_overview report */
export async function getOverview(
  source: TaskSource,
  query: OverviewQuery = {}
): Promise<OverviewResponse> {
  const includeTaskCounts = query.includeTaskCounts ?? true;
  const includeInactive = query.includeInactiveProjects ?? false;

  const [me, accessible] = await Promise.all([
    source.fetchCurrentUser(),
    source.fetchAccessibleProjects(),
  ]);
  const projects = includeInactive ? accessible : accessible.filter((p) => p.is_active);

  const overviews = collectOrThrow(
    await fanOut(projects, (project) => buildProjectOverview(source, project, includeTaskCounts))
  );

  return {
    summary: summarizeProjects(overviews, includeTaskCounts),
    projects: overviews,
    user_info: { id: String(me.id), username: me.username, name: me.name },
  };
}
