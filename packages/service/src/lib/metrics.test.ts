import { describe, it, expect, beforeEach } from "vitest";
import { AgentMetricsTracker } from "./metrics.js";

describe("AgentMetricsTracker", () => {
  let tracker: AgentMetricsTracker;

  function play(agentId: string, outcomes: boolean[]): void {
    outcomes.forEach((success, i) => {
      tracker.record(agentId, {
        method: "constraint.apply",
        success,
        ...(success ? {} : { errorCode: -32002 }),
        durationMs: 4,
        timestamp: i,
      });
    });
  }

  beforeEach(() => {
    tracker = new AgentMetricsTracker();
  });

  it("reports zeros for an unknown agent", () => {
    expect(tracker.summary("agent-x")).toEqual({
      agentId: "agent-x",
      totalOperations: 0,
      successfulOperations: 0,
      failedOperations: 0,
      successRate: 0,
      errorRate: 0,
      errorRateFirst10: 0,
      errorRateLast10: 0,
      improvementPercent: 0,
      learningStatus: "insufficient_data",
      averageDurationMs: 0,
      errorsByCode: {},
    });
  });

  it("does not judge a trend from fewer than 20 calls", () => {
    play("agent-a", [false, true, false]);
    expect(tracker.summary("agent-a")).toMatchObject({
      totalOperations: 3,
      failedOperations: 2,
      improvementPercent: 0,
      learningStatus: "insufficient_data",
    });
  });

  it("compares the first and last ten calls", () => {
    const first = [false, true, false, true, false, true, false, true, false, true];
    const last = [true, true, true, true, true, true, true, true, true, false];
    play("agent-a", [...first, ...last]);

    expect(tracker.summary("agent-a")).toEqual({
      agentId: "agent-a",
      totalOperations: 20,
      successfulOperations: 14,
      failedOperations: 6,
      successRate: 0.7,
      errorRate: 0.3,
      errorRateFirst10: 0.5,
      errorRateLast10: 0.1,
      improvementPercent: 80,
      learningStatus: "excellent_learning",
      averageDurationMs: 4,
      errorsByCode: { "-32002": 6 },
    });
  });

  it("reports a regression", () => {
    const first = [false, false, true, true, true, true, true, true, true, true];
    const last = [false, false, false, false, false, false, false, false, true, true];
    play("agent-a", [...first, ...last]);

    expect(tracker.summary("agent-a")).toMatchObject({
      improvementPercent: -300,
      learningStatus: "significant_regression",
    });
  });

  it("calls a clean start stable", () => {
    play("agent-a", Array.from({ length: 20 }, () => true));
    expect(tracker.summary("agent-a").learningStatus).toBe("stable");
  });

  it("lists agents in order", () => {
    play("agent-b", [true]);
    play("agent-a", [true]);
    expect(tracker.agents()).toEqual(["agent-a", "agent-b"]);
  });
});
