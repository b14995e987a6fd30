import type { StandaloneEvent, StepRecord, UnknownMessage } from "@steptrace/contracts";

function copyStep(step: StepRecord): StepRecord {
  return {
    ...step,
    thoughts: step.thoughts.map((thought) => ({ ...thought })),
    actions: step.actions.map((action) => ({ ...action })),
    notes: [...step.notes],
  };
}

/**
 * Map-keyed storage to the external ordered list: ascending step number, each
 * element a detached copy carrying its own stepNumber.
 */
export function flattenSteps(steps: ReadonlyMap<number, StepRecord>): StepRecord[] {
  return [...steps.values()].sort((left, right) => left.stepNumber - right.stepNumber).map(copyStep);
}

export function emptyStep(stepNumber: number, startMs: number, initializedImplicitly: boolean): StepRecord {
  return {
    stepNumber,
    startMs,
    endMs: null,
    durationMs: null,
    isComplete: false,
    closedBy: null,
    initializedImplicitly,
    thoughts: [],
    actions: [],
    outcome: "unknown",
    notes: [],
  };
}

export class TimelineModel {
  private readonly steps = new Map<number, StepRecord>();
  private readonly events: StandaloneEvent[] = [];
  private readonly unknown: UnknownMessage[] = [];
  private droppedUnknownCount = 0;

  constructor(private readonly unknownCap: number) {}

  getStep(stepNumber: number): StepRecord | undefined {
    return this.steps.get(stepNumber);
  }

  putStep(step: StepRecord): void {
    this.steps.set(step.stepNumber, step);
  }

  /** 0 while no step exists. */
  lastStepNumber(): number {
    let last = 0;
    for (const stepNumber of this.steps.keys()) {
      if (stepNumber > last) last = stepNumber;
    }
    return last;
  }

  get stepCount(): number {
    return this.steps.size;
  }

  addEvent(event: StandaloneEvent): void {
    this.events.push(event);
  }

  /** Keeps the newest `unknownCap` messages. */
  addUnknown(message: UnknownMessage): void {
    this.unknown.push(message);
    while (this.unknown.length > this.unknownCap) {
      this.unknown.shift();
      this.droppedUnknownCount += 1;
    }
  }

  get droppedUnknown(): number {
    return this.droppedUnknownCount;
  }

  getTimeline(): StepRecord[] {
    return flattenSteps(this.steps);
  }

  getEvents(): StandaloneEvent[] {
    return this.events.map((event) => ({ ...event, metadata: { ...event.metadata } }));
  }

  getUnknownMessages(): UnknownMessage[] {
    return this.unknown.map((message) => ({ ...message }));
  }

  /** Earliest and latest timestamps across steps and screenshots; lifecycle events use wall-clock time. */
  bounds(): { startMs: number | null; endMs: number | null } {
    const stamps: number[] = this.events.filter((event) => event.kind !== "session").map((event) => event.timestampMs);
    for (const step of this.steps.values()) {
      stamps.push(step.startMs);
      if (step.endMs !== null) stamps.push(step.endMs);
    }
    if (stamps.length === 0) {
      return { startMs: null, endMs: null };
    }
    return { startMs: Math.min(...stamps), endMs: Math.max(...stamps) };
  }
}
