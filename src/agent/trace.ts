/**
 * @fileoverview Append-only trace of one task.
 *
 * @module querypilot/agent/trace
 * @version 0.1.0
 */

import type { TraceEntry } from '../types/plan.types.js';

export class Trace {
  private readonly entries: TraceEntry[] = [];

  /**
   * Copies the entry's action and result, freezes the whole entry and
   * appends it. Appended entries are never changed or removed, including the
   * reply rows and argument records nested inside them.
   */
  append(entry: TraceEntry): TraceEntry {
    const frozen = deepFreeze({
      ...entry,
      action: structuredClone(entry.action),
      result: structuredClone(entry.result),
    });
    this.entries.push(frozen);
    return frozen;
  }

  /**
   * Snapshot of the entries so far.
   */
  toArray(): ReadonlyArray<TraceEntry> {
    return [...this.entries];
  }
}

/**
 * Freezes a value and everything reachable from it.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const key of Reflect.ownKeys(value)) {
      const child: unknown = Reflect.get(value, key);
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
