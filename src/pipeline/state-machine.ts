import { TERMINAL_STATES, validateTransition, type PipelineState } from "../types/pipeline.ts";
import type { StateTransition } from "./types.ts";

export type TransitionListener = (transition: StateTransition) => void;

/** Current run state plus the timestamped record of how it got there. */
export class PipelineStateMachine {
  private state: PipelineState = "init";
  private readonly transitions: StateTransition[] = [];

  constructor(
    private readonly onTransition?: TransitionListener,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get current(): PipelineState {
    return this.state;
  }

  get history(): readonly StateTransition[] {
    return this.transitions;
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.includes(this.state);
  }

  /** @throws InvalidTransitionError when the table does not allow the move. */
  transition(to: PipelineState): StateTransition {
    validateTransition(this.state, to);
    const record: StateTransition = { from: this.state, to, at: this.now().toISOString() };
    this.state = to;
    this.transitions.push(record);
    this.onTransition?.(record);
    return record;
  }
}
