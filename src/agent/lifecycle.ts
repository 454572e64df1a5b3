/**
 * @fileoverview Loop Lifecycle - the state machine of a single loop run.
 *
 * State Machine:
 * ```
 *   PLANNING ──► DECIDING ──► DESCRIBING ──► EXECUTING ──► REPLANNING
 *                   ▲              │                          │
 *                   │              └──────► REPLANNING        │
 *                   └─────────────────────────────────────────┘
 *
 *   Every non-terminal state can move to TERMINATED.
 * ```
 *
 * DESCRIBING → REPLANNING is taken when the arguments cannot be built yet.
 *
 * @module querypilot/agent/lifecycle
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import { createTimestamp } from '../types/core.types.js';
import type { Timestamp } from '../types/core.types.js';

export enum LoopState {
  PLANNING = 'PLANNING',
  DECIDING = 'DECIDING',
  DESCRIBING = 'DESCRIBING',
  EXECUTING = 'EXECUTING',
  REPLANNING = 'REPLANNING',
  TERMINATED = 'TERMINATED',
}

export interface LifecycleEvents {
  'transition': (from: LoopState, to: LoopState, reason: string) => void;
}

export interface StateHistoryEntry {
  readonly state: LoopState;
  readonly enteredAt: Timestamp;
  readonly reason: string;
}

/**
 * Valid transitions from each state.
 */
const VALID_TRANSITIONS: ReadonlyMap<LoopState, ReadonlyArray<LoopState>> = new Map([
  [LoopState.PLANNING, [LoopState.DECIDING, LoopState.TERMINATED]],
  [LoopState.DECIDING, [LoopState.DESCRIBING, LoopState.TERMINATED]],
  [LoopState.DESCRIBING, [LoopState.EXECUTING, LoopState.REPLANNING, LoopState.TERMINATED]],
  [LoopState.EXECUTING, [LoopState.REPLANNING, LoopState.TERMINATED]],
  [LoopState.REPLANNING, [LoopState.DECIDING, LoopState.TERMINATED]],
  [LoopState.TERMINATED, []],
]);

/**
 * @example
 * ```typescript
 * const lifecycle = new LoopLifecycle();
 * lifecycle.on('transition', (from, to, reason) => logger.debug(`${from} → ${to}`, { reason }));
 * lifecycle.transition(LoopState.DECIDING, 'Seed plan ready');
 * ```
 */
export class LoopLifecycle extends EventEmitter<LifecycleEvents> {
  private state: LoopState = LoopState.PLANNING;
  private readonly history: StateHistoryEntry[] = [
    { state: LoopState.PLANNING, enteredAt: createTimestamp(), reason: 'Run started' },
  ];

  getState(): LoopState {
    return this.state;
  }

  isTerminal(): boolean {
    return this.state === LoopState.TERMINATED;
  }

  canTransition(target: LoopState): boolean {
    return VALID_TRANSITIONS.get(this.state)?.includes(target) ?? false;
  }

  /**
   * @throws Error if the transition is not allowed from the current state
   */
  transition(target: LoopState, reason: string): void {
    if (!this.canTransition(target)) {
      throw new Error(`Invalid transition: '${this.state}' → '${target}'`);
    }

    const from = this.state;
    this.state = target;
    this.history.push({ state: target, enteredAt: createTimestamp(), reason });
    this.emit('transition', from, target, reason);
  }

  /**
   * Moves to TERMINATED unless already there.
   */
  terminate(reason: string): void {
    if (!this.isTerminal()) {
      this.transition(LoopState.TERMINATED, reason);
    }
  }

  getHistory(): ReadonlyArray<StateHistoryEntry> {
    return [...this.history];
  }
}
