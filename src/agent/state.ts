/**
 * Turn state machine
 *
 * AWAITING_INPUT -> REASONING -> { DISPATCHING_TOOL, TERMINATING }
 * DISPATCHING_TOOL -> REASONING
 * TERMINATING -> AWAITING_INPUT
 */

// =============================================================================
// Agent States
// =============================================================================

export type AgentState = 'AWAITING_INPUT' | 'REASONING' | 'DISPATCHING_TOOL' | 'TERMINATING';

export const TRANSITIONS: Readonly<Record<AgentState, readonly AgentState[]>> = {
  AWAITING_INPUT: ['REASONING'],
  REASONING: ['DISPATCHING_TOOL', 'TERMINATING'],
  DISPATCHING_TOOL: ['REASONING'],
  TERMINATING: ['AWAITING_INPUT'],
};

export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: AgentState,
    public readonly to: AgentState
  ) {
    super(`Illegal state transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

// =============================================================================
// State Machine
// =============================================================================

/**
 * One instance per turn. Every state entered is recorded, starting with
 * AWAITING_INPUT.
 */
export class TurnStateMachine {
  private state: AgentState = 'AWAITING_INPUT';
  private readonly visited: AgentState[] = ['AWAITING_INPUT'];

  getState(): AgentState {
    return this.state;
  }

  canTransition(to: AgentState): boolean {
    return TRANSITIONS[this.state].includes(to);
  }

  /**
   * @throws IllegalTransitionError when `to` is not reachable from the current state
   */
  transition(to: AgentState): void {
    if (!this.canTransition(to)) {
      throw new IllegalTransitionError(this.state, to);
    }
    this.state = to;
    this.visited.push(to);
  }

  /**
   * States in the order they were entered
   */
  getVisited(): AgentState[] {
    return [...this.visited];
  }
}
