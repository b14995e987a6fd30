import { describe, expect, it } from "vitest";
import { StepTracker } from "../steps.js";
import { ThoughtStore } from "../thoughts.js";
import { TimelineModel } from "../timeline.js";

function setup(): { tracker: StepTracker; timeline: TimelineModel; thoughts: ThoughtStore } {
  const timeline = new TimelineModel(100);
  const thoughts = new ThoughtStore();
  return { tracker: new StepTracker(timeline, thoughts), timeline, thoughts };
}

describe("StepTracker", () => {
  it("opens consecutive steps and closes each at the next start", () => {
    const { tracker, timeline } = setup();
    tracker.start(1, 1_000);
    tracker.start(2, 1_500);
    tracker.start(3, 2_250);

    const steps = timeline.getTimeline();
    expect(steps.map((step) => step.stepNumber)).toEqual([1, 2, 3]);
    expect(steps[0]).toMatchObject({ endMs: 1_500, durationMs: 500, isComplete: true, closedBy: "next_step" });
    expect(steps[1]).toMatchObject({ endMs: 2_250, durationMs: 750, isComplete: true, closedBy: "next_step" });
    expect(steps[2]).toMatchObject({ endMs: null, isComplete: false, closedBy: null });
    expect(tracker.openStep).toBe(3);
  });

  it("synthesizes skipped steps with placeholder thoughts", () => {
    const { tracker, timeline } = setup();
    tracker.start(1, 1_000);
    const result = tracker.start(3, 3_000);

    expect(result).toEqual({ status: "opened", stepNumber: 3, closedPrevious: 1, synthesized: [2] });
    const gap = timeline.getStep(2);
    expect(gap).toMatchObject({
      initializedImplicitly: true,
      startMs: 3_000,
      endMs: 3_000,
      durationMs: 0,
      isComplete: false,
      closedBy: "next_step",
      notes: ["synthesized to fill a gap before step 3"],
    });
    expect(gap?.thoughts.map((thought) => [thought.category, thought.placeholder])).toEqual([
      ["evaluation", true],
      ["memory", true],
      ["next_goal", true],
    ]);
    expect(timeline.getStep(1)).toMatchObject({ endMs: 3_000, durationMs: 2_000 });
  });

  it("ignores stale start markers and counts them", () => {
    const { tracker, timeline } = setup();
    tracker.start(1, 1_000);
    tracker.start(2, 2_000);
    expect(tracker.start(1, 3_000)).toEqual({ status: "stale", stepNumber: 1 });
    expect(tracker.start(2, 3_000)).toEqual({ status: "already_open", stepNumber: 2 });
    expect(tracker.ignoredMarkers).toBe(1);
    expect(timeline.stepCount).toBe(2);
  });

  it("opens step 1 implicitly for content that arrives before any marker", () => {
    const { tracker, timeline } = setup();
    tracker.recordThought("Eval", "Success - page loaded", 500);
    expect(timeline.getTimeline()).toHaveLength(1);
    expect(timeline.getStep(1)).toMatchObject({ initializedImplicitly: true, startMs: 500 });
    expect(tracker.start(1, 600)).toEqual({ status: "already_open", stepNumber: 1 });
  });

  it("opens the next number implicitly after a step was ended", () => {
    const { tracker, timeline } = setup();
    tracker.start(1, 100);
    tracker.end(1, 200);
    const action = tracker.recordAction('{"type":"scroll"}', 'Action: {"type":"scroll"}', 300);
    expect(action.stepNumber).toBe(2);
    expect(timeline.getStep(2)?.initializedImplicitly).toBe(true);
  });

  it("handles end markers for open, earlier and unknown steps", () => {
    const { tracker, timeline } = setup();
    tracker.start(1, 100);
    tracker.start(3, 300);
    expect(tracker.end(3, 450)).toEqual({ status: "closed", stepNumber: 3 });
    expect(timeline.getStep(3)).toMatchObject({ isComplete: true, closedBy: "end_marker", durationMs: 150 });
    expect(tracker.openStep).toBeNull();

    expect(tracker.end(2, 500)).toEqual({ status: "completed_earlier", stepNumber: 2 });
    expect(timeline.getStep(2)).toMatchObject({ isComplete: true, closedBy: "end_marker", endMs: 300 });

    expect(tracker.end(3, 600)).toEqual({ status: "already_complete", stepNumber: 3 });
    expect(tracker.end(9, 700)).toEqual({ status: "unknown_step", stepNumber: 9 });
  });

  it("clamps step numbers below 1 with a note", () => {
    const { tracker, timeline } = setup();
    tracker.start(0, 100);
    expect(timeline.getStep(1)?.notes).toEqual(["step number 0 clamped to 1"]);
    expect(tracker.clampedValues).toBe(1);
    expect(timeline.getStep(0)).toBeUndefined();
  });

  it("clamps negative durations from out-of-order timestamps", () => {
    const { tracker, timeline } = setup();
    tracker.start(1, 1_000);
    tracker.end(1, 400);
    expect(timeline.getStep(1)).toMatchObject({ endMs: 1_000, durationMs: 0 });
    expect(tracker.clampedValues).toBe(1);
  });

  it("closes the open step at the last observed timestamp on finish", () => {
    const { tracker, timeline } = setup();
    tracker.start(1, 100);
    tracker.recordThought("Memory", "logged in", 900);
    tracker.finish();
    expect(timeline.getStep(1)).toMatchObject({ endMs: 900, durationMs: 800, isComplete: false, closedBy: "finish" });
    expect(tracker.openStep).toBeNull();
  });

  it("lets the latest decisive evaluation set the outcome", () => {
    const { tracker, timeline } = setup();
    tracker.start(1, 100);
    tracker.recordThought("Eval", "Success - opened the form", 110);
    expect(timeline.getStep(1)?.outcome).toBe("success");
    tracker.recordThought("👎 Eval", "the submit button was missing", 120);
    expect(timeline.getStep(1)?.outcome).toBe("failure");
    tracker.recordThought("Eval", "Unclear whether it worked", 130);
    expect(timeline.getStep(1)?.outcome).toBe("failure");
  });

  it("attaches results to the latest action of the open step", () => {
    const { tracker, timeline } = setup();
    expect(tracker.attachResult("nothing yet", 50)).toBe(false);
    tracker.start(1, 100);
    tracker.recordAction('{"type":"click"}', 'Action: {"type":"click"}', 110);
    tracker.recordAction('{"type":"wait"}', 'Action: {"type":"wait"}', 120);
    expect(tracker.attachResult("waited 2s", 130)).toBe(true);
    expect(tracker.attachResult("page settled", 140)).toBe(true);
    const actions = timeline.getStep(1)?.actions ?? [];
    expect(actions[0]?.result).toBeUndefined();
    expect(actions[1]?.result).toBe("waited 2s\npage settled");
  });
});
