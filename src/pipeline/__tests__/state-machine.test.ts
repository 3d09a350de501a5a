import { describe, expect, it } from "vitest";
import { InvalidTransitionError, RUN_SEQUENCE } from "../../types/pipeline.ts";
import type { StateTransition } from "../types.ts";
import { PipelineStateMachine } from "../state-machine.ts";

const fixedNow = () => new Date("2026-03-01T09:30:00.000Z");

describe("PipelineStateMachine", () => {
  it("walks the full run sequence to succeeded", () => {
    const machine = new PipelineStateMachine(undefined, fixedNow);

    for (const state of RUN_SEQUENCE) machine.transition(state);
    machine.transition("succeeded");

    expect(machine.current).toBe("succeeded");
    expect(machine.isTerminal()).toBe(true);
    expect(machine.history).toHaveLength(RUN_SEQUENCE.length + 1);
    expect(machine.history[0]).toEqual({ from: "init", to: "prereq-check", at: "2026-03-01T09:30:00.000Z" });
  });

  it("allows failing from any running state", () => {
    const machine = new PipelineStateMachine();
    machine.transition("prereq-check");
    machine.transition("env-setup");

    machine.transition("failed");

    expect(machine.current).toBe("failed");
  });

  it("rejects skipping a state", () => {
    const machine = new PipelineStateMachine();
    machine.transition("prereq-check");

    expect(() => machine.transition("build")).toThrow(InvalidTransitionError);
    expect(() => machine.transition("build")).toThrow('Invalid pipeline transition: "prereq-check" -> "build"');
    expect(machine.current).toBe("prereq-check");
  });

  it("rejects leaving a terminal state", () => {
    const machine = new PipelineStateMachine();
    machine.transition("failed");

    expect(() => machine.transition("prereq-check")).toThrow(InvalidTransitionError);
  });

  it("notifies the listener on every transition", () => {
    const seen: StateTransition[] = [];
    const machine = new PipelineStateMachine((t) => seen.push(t), fixedNow);

    machine.transition("prereq-check");
    machine.transition("failed");

    expect(seen.map((t) => `${t.from}->${t.to}`)).toEqual(["init->prereq-check", "prereq-check->failed"]);
  });
});
