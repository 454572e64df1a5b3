/**
 * @fileoverview Unit tests for Trace
 */

import { describe, it, expect } from 'vitest';
import { Trace, deepFreeze } from './trace.js';
import type { TraceEntry } from '../types/plan.types.js';
import { queryComposed, tablesListed } from '../testing/builders.js';

function replyOf(entry: TraceEntry): unknown[] {
  const payload = entry.result.payload;
  if (typeof payload === 'object' && payload !== null && 'reply' in payload && Array.isArray(payload.reply)) {
    return payload.reply;
  }
  throw new Error('entry has no reply rows');
}

describe('Trace', () => {
  it('should reject changes to reply rows once appended', () => {
    const appended = new Trace().append(tablesListed(1, ['users']));

    expect(() => replyOf(appended).push({ table_name: 'injected' })).toThrow(TypeError);
    expect(Object.isFrozen(replyOf(appended)[0])).toBe(true);
    expect(replyOf(appended)).toEqual([{ table_name: 'users' }]);
  });

  it('should freeze nested argument records', () => {
    const appended = new Trace().append(queryComposed(1, 'SELECT 1'));

    expect(Object.isFrozen(appended.action.arguments['table_structures'])).toBe(true);
  });

  it('should not see later changes to the appended value', () => {
    const source = tablesListed(1, ['users']);
    const appended = new Trace().append(source);

    replyOf(source).push({ table_name: 'late' });

    expect(replyOf(appended)).toHaveLength(1);
  });

  it('should hand out snapshots', () => {
    const trace = new Trace();
    trace.append(tablesListed(1, ['users']));
    const snapshot = trace.toArray();

    trace.append(queryComposed(2, 'SELECT 1'));

    expect(snapshot).toHaveLength(1);
    expect(trace.toArray()).toHaveLength(2);
  });
});

describe('deepFreeze', () => {
  it('should leave primitives alone', () => {
    expect(deepFreeze('text')).toBe('text');
    expect(deepFreeze(null)).toBeNull();
  });
});
