/**
 * @fileoverview Unit tests for LoopLifecycle
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LoopLifecycle, LoopState } from './lifecycle.js';

describe('LoopLifecycle', () => {
  let lifecycle: LoopLifecycle;

  beforeEach(() => {
    lifecycle = new LoopLifecycle();
  });

  describe('initial state', () => {
    it('should start in PLANNING', () => {
      expect(lifecycle.getState()).toBe(LoopState.PLANNING);
    });

    it('should not be terminal initially', () => {
      expect(lifecycle.isTerminal()).toBe(false);
    });
  });

  describe('transition()', () => {
    it('should follow one full cycle', () => {
      lifecycle.transition(LoopState.DECIDING, 'Cycle 1');
      lifecycle.transition(LoopState.DESCRIBING, 'Chosen');
      lifecycle.transition(LoopState.EXECUTING, 'Dispatching');
      lifecycle.transition(LoopState.REPLANNING, 'Done');
      lifecycle.transition(LoopState.DECIDING, 'Cycle 2');

      expect(lifecycle.getState()).toBe(LoopState.DECIDING);
    });

    it('should allow replanning straight from DESCRIBING', () => {
      lifecycle.transition(LoopState.DECIDING, 'Cycle 1');
      lifecycle.transition(LoopState.DESCRIBING, 'Chosen');

      expect(lifecycle.canTransition(LoopState.REPLANNING)).toBe(true);
      lifecycle.transition(LoopState.REPLANNING, 'Arguments not constructible');
      expect(lifecycle.getState()).toBe(LoopState.REPLANNING);
    });

    it('should throw on invalid transitions', () => {
      expect(() => lifecycle.transition(LoopState.EXECUTING, 'Skip ahead')).toThrow(
        "Invalid transition: 'PLANNING' → 'EXECUTING'",
      );
    });

    it('should not allow DECIDING to go straight back to REPLANNING', () => {
      lifecycle.transition(LoopState.DECIDING, 'Cycle 1');

      expect(lifecycle.canTransition(LoopState.REPLANNING)).toBe(false);
    });

    it('should emit transition events', () => {
      const listener = vi.fn();
      lifecycle.on('transition', listener);

      lifecycle.transition(LoopState.DECIDING, 'Cycle 1');

      expect(listener).toHaveBeenCalledWith(LoopState.PLANNING, LoopState.DECIDING, 'Cycle 1');
    });
  });

  describe('terminate()', () => {
    it('should reach TERMINATED from any live state', () => {
      lifecycle.transition(LoopState.DECIDING, 'Cycle 1');
      lifecycle.terminate('Cancelled');

      expect(lifecycle.isTerminal()).toBe(true);
    });

    it('should be a no-op once terminated', () => {
      const listener = vi.fn();
      lifecycle.terminate('Done');
      lifecycle.on('transition', listener);

      lifecycle.terminate('Again');

      expect(listener).not.toHaveBeenCalled();
      expect(lifecycle.canTransition(LoopState.DECIDING)).toBe(false);
    });
  });

  describe('getHistory()', () => {
    it('should record every state entered with its reason', () => {
      lifecycle.transition(LoopState.DECIDING, 'Cycle 1');
      lifecycle.terminate('Stopped');

      expect(lifecycle.getHistory().map(({ state, reason }) => [state, reason])).toEqual([
        [LoopState.PLANNING, 'Run started'],
        [LoopState.DECIDING, 'Cycle 1'],
        [LoopState.TERMINATED, 'Stopped'],
      ]);
    });
  });
});
