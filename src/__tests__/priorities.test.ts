import { describe, it, expect } from "vitest";
import { DEFAULT_THRESHOLDS, resolveThresholds } from "../config.js";
import {
  analyzeTeamWorkloads,
  calculateUrgencyScore,
  findBottlenecks,
  findUrgentItems,
  generateRecommendations,
  getPriorities,
  horizonLimit,
  matchesUserId,
  urgencyReason,
  workloadStatus,
  type PrioritiesAnalysis,
  type UserWorkload,
} from "../priorities.js";
import type { TaskDetail } from "../tasks.js";
import { formatTimestamp } from "../time.js";
import {
  ALICE,
  BOB,
  daysFromNow,
  detail,
  FakeTaskSource,
  NOW,
  project,
  rawTask,
} from "./fixtures.js";

/** A task due `days` from the evaluation instant */
function dueIn(id: string, days: number, overrides: Partial<TaskDetail> = {}): TaskDetail {
  return detail(id, {
    dates: {
      created: "2024-03-01T12:00:00Z",
      due: formatTimestamp(daysFromNow(days)),
      modified: null,
      started: null,
    },
    is_overdue: days < 0,
    days_until_due: Math.floor(days),
    ...overrides,
  });
}

function hours(id: string, estimated: number, overrides: Partial<TaskDetail> = {}): TaskDetail {
  return detail(id, {
    time_tracking: { estimated_hours: estimated, spent_hours: 0, remaining_hours: estimated },
    ...overrides,
  });
}

const WEEK = horizonLimit("week", NOW);

// ─── Workload ───────────────────────────────────────────

describe("matchesUserId", () => {
  it("compares literally or as integers", () => {
    expect(matchesUserId("7", "7")).toBe(true);
    expect(matchesUserId("7", "007")).toBe(true);
    expect(matchesUserId("+7", "7")).toBe(true);
    expect(matchesUserId("alice", "alice")).toBe(true);
    expect(matchesUserId("7", "8")).toBe(false);
    expect(matchesUserId("7a", "7")).toBe(false);
  });

  it("keeps ids beyond double precision apart", () => {
    expect(matchesUserId("9007199254740993", "9007199254740992")).toBe(false);
    expect(matchesUserId("9007199254740993", "09007199254740993")).toBe(true);
  });
});

describe("workloadStatus", () => {
  it("uses strict thresholds", () => {
    expect(workloadStatus(120.01)).toBe("severely_overloaded");
    expect(workloadStatus(120)).toBe("overloaded");
    expect(workloadStatus(100)).toBe("at_capacity");
    expect(workloadStatus(80)).toBe("normal");
    expect(workloadStatus(50)).toBe("underutilized");
  });
});

describe("analyzeTeamWorkloads", () => {
  it("sums estimated hours per assignee and ranks by hours", () => {
    const tasks = [
      hours("1", 10, { assignee: BOB }),
      hours("2", 20, { assignee: ALICE, is_overdue: true }),
      hours("3", 22, { assignee: ALICE }),
      hours("4", 30),
    ];

    expect(analyzeTeamWorkloads(tasks)).toEqual([
      {
        user_id: "7",
        username: "alice",
        name: "Alice",
        assigned_tasks: 2,
        overdue_tasks: 1,
        total_estimated_hours: 42,
        capacity_utilization: "105%",
        utilization_percent: 105,
        status: "overloaded",
      },
      {
        user_id: "8",
        username: "bob",
        name: "Bob",
        assigned_tasks: 1,
        overdue_tasks: 0,
        total_estimated_hours: 10,
        capacity_utilization: "25%",
        utilization_percent: 25,
        status: "underutilized",
      },
    ]);
  });

  it("classifies exactly full capacity as at_capacity", () => {
    const [workload] = analyzeTeamWorkloads([hours("1", 40, { assignee: ALICE })]);
    expect(workload.capacity_utilization).toBe("100%");
    expect(workload.status).toBe("at_capacity");
  });

  it("honours a configured weekly capacity", () => {
    const thresholds = resolveThresholds({ weeklyCapacityHours: 20 });
    const [workload] = analyzeTeamWorkloads([hours("1", 30, { assignee: ALICE })], thresholds);
    expect(workload.capacity_utilization).toBe("150%");
    expect(workload.status).toBe("severely_overloaded");
  });
});

// ─── Urgency ────────────────────────────────────────────

describe("calculateUrgencyScore", () => {
  it("adds due date, overdue, priority and assignment bonuses", () => {
    expect(calculateUrgencyScore(dueIn("1", -10, { priority: "urgent" }), NOW, WEEK)).toBe(130);
    expect(
      calculateUrgencyScore(dueIn("2", -1.5, { assignee: ALICE }), NOW, WEEK)
    ).toBe(75);
    expect(
      calculateUrgencyScore(dueIn("3", 0.5, { assignee: ALICE }), NOW, WEEK)
    ).toBe(50);
    expect(
      calculateUrgencyScore(dueIn("4", 2.5, { assignee: ALICE, priority: "high" }), NOW, WEEK)
    ).toBe(50);
    expect(calculateUrgencyScore(dueIn("5", 5, { priority: "low" }), NOW, WEEK)).toBe(45);
    expect(calculateUrgencyScore(detail("6"), NOW, WEEK)).toBe(20);
  });

  it("ignores due dates beyond the horizon", () => {
    const task = dueIn("1", 3, { assignee: ALICE });
    expect(calculateUrgencyScore(task, NOW, horizonLimit("today", NOW))).toBe(25);
    expect(calculateUrgencyScore(task, NOW, horizonLimit("week", NOW))).toBe(40);
  });

  it("never decreases as a task becomes more overdue", () => {
    const scores = [-1, -2, -4, -6, -8, -12].map((days) =>
      calculateUrgencyScore(dueIn("x", days, { assignee: ALICE }), NOW, WEEK)
    );
    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeGreaterThanOrEqual(scores[i - 1]);
    }
  });
});

describe("urgencyReason", () => {
  it("reports the first applicable reason", () => {
    expect(urgencyReason(dueIn("1", -0.5))).toBe("Overdue by 1 day");
    expect(urgencyReason(dueIn("1", -10))).toBe("Overdue by 10 days");
    expect(urgencyReason(dueIn("1", 0.5))).toBe("Due today");
    expect(urgencyReason(dueIn("1", 1.5))).toBe("Due tomorrow");
    expect(urgencyReason(dueIn("1", 3.5))).toBe("Due in 3 days");
    expect(urgencyReason(dueIn("1", 5, { priority: "urgent" }))).toBe(
      "marked as urgent priority"
    );
    expect(urgencyReason(detail("1", { priority: "high" }))).toBe("marked as high priority");
    expect(urgencyReason(detail("1"))).toBe("unassigned task needs attention");
    expect(urgencyReason(detail("1", { assignee: ALICE }))).toBe("High priority task");
  });
});

describe("findUrgentItems", () => {
  it("keeps tasks at or above the cutoff, most urgent first", () => {
    const tasks = [
      dueIn("a", 0.5),
      dueIn("b", -1.5, { assignee: ALICE }),
      dueIn("c", -10, { priority: "urgent", title: "Fix login" }),
      dueIn("d", 1.5, { priority: "urgent" }),
      dueIn("e", -0.5, { assignee: ALICE, priority: "low" }),
    ];

    const items = findUrgentItems(tasks, "week", NOW);

    expect(items.map((i) => [i.task_id, i.urgency_score])).toEqual([
      ["c", 130],
      ["d", 85],
      ["b", 75],
      ["e", 70],
    ]);
    expect(items[0]).toEqual({
      task_id: "c",
      title: "Fix login",
      urgency_score: 130,
      reason: "Overdue by 10 days",
      project: "Website",
      days_overdue: 10,
    });
    expect(items[1].days_overdue).toBeUndefined();
  });

  it("returns at most ten items", () => {
    const tasks = Array.from({ length: 12 }, (_, i) => dueIn(String(i), -10));
    expect(findUrgentItems(tasks, "week", NOW)).toHaveLength(DEFAULT_THRESHOLDS.maxUrgentItems);
  });
});

// ─── Bottlenecks ────────────────────────────────────────

describe("findBottlenecks", () => {
  function waiting(id: string, column: string, days: number, projectId = "1"): TaskDetail {
    return detail(id, {
      project: { id: projectId, name: projectId === "1" ? "Website" : "Mobile" },
      status: { column, swimlane: "Default swimlane" },
      dates: {
        created: null,
        due: null,
        modified: formatTimestamp(daysFromNow(-days)),
        started: null,
      },
    });
  }

  it("reports columns with enough long-waiting tasks", () => {
    const tasks = [
      waiting("r1", "Review", 4),
      waiting("r2", "Review", 4),
      waiting("r3", "Review", 4),
      waiting("q1", "QA", 10),
      waiting("q2", "QA", 10),
      waiting("q3", "QA", 1),
      waiting("b1", "Backlog", 2.5),
      waiting("b2", "Backlog", 2.5),
      waiting("b3", "Backlog", 2.5),
      waiting("k1", "Blocked", 8),
      waiting("k2", "Blocked", 8),
      waiting("k3", "Blocked", 8),
      waiting("m1", "Review", 10, "2"),
      waiting("m2", "Review", 10, "2"),
    ];

    expect(findBottlenecks(tasks, NOW)).toEqual([
      {
        column: "Blocked",
        project: "Website",
        stuck_tasks: 3,
        avg_wait_time_days: 8,
        task_ids: ["k1", "k2", "k3"],
      },
      {
        column: "Review",
        project: "Website",
        stuck_tasks: 3,
        avg_wait_time_days: 4,
        task_ids: ["r1", "r2", "r3"],
      },
    ]);
  });

  it("skips tasks without a modification date", () => {
    const tasks = [
      waiting("1", "Review", 5),
      waiting("2", "Review", 5),
      detail("3", { status: { column: "Review", swimlane: "" } }),
      detail("4", {
        status: { column: "Review", swimlane: "" },
        dates: { created: null, due: null, modified: null, started: null },
      }),
    ];
    // task 3 keeps the fixture's recent modification date
    expect(findBottlenecks(tasks, NOW)).toEqual([]);
  });
});

// ─── Recommendations ────────────────────────────────────

function workload(
  id: string,
  name: string,
  hoursTotal: number,
  status: UserWorkload["status"]
): UserWorkload {
  const percent = Math.round((hoursTotal / 40) * 100);
  return {
    user_id: id,
    username: name.toLowerCase(),
    name,
    assigned_tasks: 1,
    overdue_tasks: 0,
    total_estimated_hours: hoursTotal,
    capacity_utilization: `${percent}%`,
    utilization_percent: percent,
    status,
  };
}

describe("generateRecommendations", () => {
  const alice = workload("7", "Alice", 42, "overloaded");
  const analysis: PrioritiesAnalysis = {
    requesting_user: alice,
    team_workloads: [
      workload("9", "Dave", 50, "severely_overloaded"),
      alice,
      workload("8", "Bob", 24, "normal"),
      workload("10", "Erin", 8, "underutilized"),
    ],
    urgent_items: [
      {
        task_id: "5",
        title: "Fix login",
        urgency_score: 130,
        reason: "Overdue by 10 days",
        project: "Website",
        days_overdue: 10,
      },
    ],
    bottlenecks: [
      {
        column: "Review",
        project: "Website",
        stuck_tasks: 3,
        avg_wait_time_days: 4,
        task_ids: ["r1", "r2", "r3"],
      },
    ],
  };

  it("emits one recommendation per applicable rule", () => {
    expect(generateRecommendations(analysis)).toEqual([
      {
        type: "priority",
        message: "Focus on 'Fix login' first - urgency score: 130 (Overdue by 10 days)",
        task_ids: ["5"],
        confidence: 0.92,
      },
      {
        type: "workload",
        message:
          "Your workload is overloaded (105% utilization) - consider delegating or deferring lower priority tasks",
        confidence: 0.85,
      },
      {
        type: "delegation",
        message: "Consider redistributing tasks from Dave (125%) to Erin (20%)",
        suggested_assignee: "10",
        confidence: 0.78,
      },
      {
        type: "process",
        message: "'Review' column in Website has bottleneck - 3 tasks waiting 4.0 days on average",
        affected_tasks: ["r1", "r2", "r3"],
        confidence: 0.85,
      },
    ]);
  });

  it("skips delegation for a team of one", () => {
    const solo = generateRecommendations({
      team_workloads: [alice],
      urgent_items: [],
      bottlenecks: [],
    });
    expect(solo).toEqual([]);
  });
});

// ─── End to end ─────────────────────────────────────────

describe("getPriorities", () => {
  const source = () =>
    new FakeTaskSource({
      projects: [project(1, "Website")],
      tasks: {
        1: [
          rawTask(1, { owner_id: 7, time_estimated: 44, date_due: daysFromNow(-10), priority: 3 }),
          rawTask(2, { owner_id: 8, time_estimated: 8, column_id: 3 }),
        ],
      },
    });

  it("analyzes the authenticated user by default", async () => {
    const fake = source();
    const result = await getPriorities(
      fake,
      { projectIds: [], timeHorizon: "week", includeRecommendations: true },
      { now: NOW }
    );

    expect(fake.calls).toContain("me");
    expect(result.analysis.requesting_user?.user_id).toBe("7");
    expect(result.analysis.requesting_user?.status).toBe("overloaded");
    expect(result.analysis.team_workloads.map((w) => w.user_id)).toEqual(["7", "8"]);
    expect(result.analysis.urgent_items.map((i) => i.task_id)).toEqual(["1"]);
    expect(result.recommendations?.map((r) => r.type)).toEqual([
      "priority",
      "workload",
      "delegation",
    ]);
  });

  it("uses the requested user id without asking Kanboard", async () => {
    const fake = source();
    const result = await getPriorities(
      fake,
      { userId: "008", projectIds: [], timeHorizon: "week", includeRecommendations: false },
      { now: NOW }
    );

    expect(fake.calls).not.toContain("me");
    expect(result.analysis.requesting_user?.username).toBe("bob");
    expect(result.recommendations).toBeUndefined();
  });
});
