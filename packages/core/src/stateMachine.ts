/**
 * Packaging State Machine
 * 
 * Linear state machine for a single packaging run.
 * 
 * State Flow:
 * START → PARSED_CONFIG → RESOLVED_VERSION → VALIDATED_DIRS → COLLECTED_FILES
 *       → STAGED → ARCHIVED → VERIFIED → RELOCATED → DONE
 *                    ↘ FAILED (from any non-terminal state)
 * 
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - There is no retry: FAILED and DONE are terminal
 */

import { StateTransitionError } from './errors/index.js';

const PACKAGING_STATES = [
  'START',
  'PARSED_CONFIG',
  'RESOLVED_VERSION',
  'VALIDATED_DIRS',
  'COLLECTED_FILES',
  'STAGED',
  'ARCHIVED',
  'VERIFIED',
  'RELOCATED',
  'DONE',
  'FAILED',
] as const;

export type PackagingState = (typeof PACKAGING_STATES)[number];

/**
 * Represents a state transition with metadata
 */
export interface PackagingStateTransition {
  from: PackagingState;
  to: PackagingState;
  timestamp: Date;
  reason?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<PackagingState, Set<PackagingState>> = {
  START: new Set<PackagingState>(['PARSED_CONFIG', 'FAILED']),
  PARSED_CONFIG: new Set<PackagingState>(['RESOLVED_VERSION', 'FAILED']),
  RESOLVED_VERSION: new Set<PackagingState>(['VALIDATED_DIRS', 'FAILED']),
  VALIDATED_DIRS: new Set<PackagingState>(['COLLECTED_FILES', 'FAILED']),
  COLLECTED_FILES: new Set<PackagingState>(['STAGED', 'FAILED']),
  STAGED: new Set<PackagingState>(['ARCHIVED', 'FAILED']),
  ARCHIVED: new Set<PackagingState>(['VERIFIED', 'FAILED']),
  VERIFIED: new Set<PackagingState>(['RELOCATED', 'FAILED']),
  RELOCATED: new Set<PackagingState>(['DONE', 'FAILED']),
  DONE: new Set<PackagingState>([]), // Terminal state
  FAILED: new Set<PackagingState>([]), // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: PackagingState, to: PackagingState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Packaging State Machine class
 * Tracks one run through the pipeline and refuses out-of-order steps
 */
export class PackagingStateMachine {
  private currentState: PackagingState;
  private history: PackagingStateTransition[];
  private readonly runId: string;

  constructor(runId: string, initialState: PackagingState = 'START') {
    this.runId = runId;
    this.currentState = initialState;
    this.history = [];
  }

  getState(): PackagingState {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<PackagingStateTransition> {
    return [...this.history];
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(
    targetState: PackagingState,
    reason?: string,
    metadata?: Record<string, unknown>
  ): PackagingStateTransition {
    if (!isValidTransition(this.currentState, targetState)) {
      throw new StateTransitionError(this.runId, this.currentState, targetState);
    }

    const transition: PackagingStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
      metadata,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return this.currentState === 'DONE' || this.currentState === 'FAILED';
  }

  hasFailed(): boolean {
    return this.currentState === 'FAILED';
  }

  isComplete(): boolean {
    return this.currentState === 'DONE';
  }

  /**
   * Fail the run with a reason
   */
  fail(reason: string, metadata?: Record<string, unknown>): PackagingStateTransition {
    return this.transitionTo('FAILED', reason, metadata);
  }
}
