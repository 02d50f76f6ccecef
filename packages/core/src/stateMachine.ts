/**
 * Job State Machine
 * 
 * Strict state machine for encode job lifecycle management.
 * 
 * State Flow:
 * pending → running → succeeded
 *     ↘         ↘ failed
 *      cancelled ← ┘
 * 
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Terminal states never change; a retry is a new job
 */

import type { JobState } from './types/job.js';
import { StateTransitionError } from './errors/index.js';

/**
 * Represents a state transition with metadata
 */
export interface JobStateTransition {
  from: JobState;
  to: JobState;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<JobState, ReadonlySet<JobState>> = {
  pending: new Set<JobState>(['running', 'cancelled']),
  running: new Set<JobState>(['succeeded', 'failed', 'cancelled']),
  succeeded: new Set<JobState>(),
  failed: new Set<JobState>(),
  cancelled: new Set<JobState>(),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: JobState, to: JobState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: JobState): JobState[] {
  return Array.from(validTransitions[current]);
}

export function isTerminalState(state: JobState): boolean {
  return validTransitions[state].size === 0;
}

/**
 * Job State Machine class
 * Manages state transitions with validation
 */
export class JobStateMachine {
  private currentState: JobState = 'pending';
  private history: JobStateTransition[] = [];
  private readonly jobId: string;

  constructor(jobId: string) {
    this.jobId = jobId;
  }

  /**
   * Get the current state
   */
  getState(): JobState {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<JobStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: JobState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: JobState, reason?: string): JobStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.jobId, this.currentState, targetState);
    }

    const transition: JobStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }
}
