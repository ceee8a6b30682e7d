import { describe, it, expect } from "vitest";
import { canTransition, isTerminal, nextStatus, STAGE_PROGRESS, STAGE_SEQUENCE } from "../states.js";

describe("pipeline states", () => {
  it("should walk the stage sequence one step at a time", () => {
    const walked: string[] = [];
    let status: (typeof STAGE_SEQUENCE)[number] | null = "uploaded";
    while (status !== null) {
      walked.push(status);
      status = nextStatus(status, null);
    }
    expect(walked).toEqual([...STAGE_SEQUENCE]);
  });

  it("should resume after the stage that asked for feedback", () => {
    expect(nextStatus("needs_feedback", "mapped")).toBe("strategized");
    expect(nextStatus("needs_feedback", "strategized")).toBe("done");
    expect(nextStatus("needs_feedback", null)).toBeNull();
  });

  it("should stop at terminal states", () => {
    expect(isTerminal("done")).toBe(true);
    expect(isTerminal("failed")).toBe(true);
    expect(isTerminal("needs_feedback")).toBe(false);
    expect(nextStatus("failed", null)).toBeNull();
  });

  it("should allow only forward steps, failure and feedback after planning stages", () => {
    expect(canTransition("uploaded", "structure_analyzed")).toBe(true);
    expect(canTransition("uploaded", "content_analyzed")).toBe(false);
    expect(canTransition("classified", "failed")).toBe(true);
    expect(canTransition("mapped", "needs_feedback")).toBe(true);
    expect(canTransition("classified", "needs_feedback")).toBe(false);
    expect(canTransition("needs_feedback", "strategized", "mapped")).toBe(true);
    expect(canTransition("done", "failed")).toBe(false);
  });

  it("should report increasing progress along the sequence", () => {
    const progress = STAGE_SEQUENCE.map((stage) => STAGE_PROGRESS[stage].progress);
    expect(progress).toEqual([0, 20, 40, 60, 75, 90, 100]);
  });
});
