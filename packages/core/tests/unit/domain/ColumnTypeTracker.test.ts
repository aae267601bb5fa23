import { describe, it, expect, vi } from 'vitest';
import { ColumnTypeTracker } from '../../../src/domain/services/ColumnTypeTracker.js';

describe('ColumnTypeTracker', () => {
  it('should start every column at UNKNOWN', () => {
    const tracker = new ColumnTypeTracker(3);
    expect(tracker.snapshot()).toEqual(['UNKNOWN', 'UNKNOWN', 'UNKNOWN']);
    expect(tracker.columnCount).toBe(3);
  });

  it('should classify each column independently', () => {
    const tracker = new ColumnTypeTracker(3);
    tracker.observeRow(['1', 'Alice', '3.5']);
    tracker.observeRow(['2', 'Bob', '4']);
    expect(tracker.finalize()).toEqual(['INTEGER', 'TEXT', 'REAL']);
  });

  it('should leave missing trailing cells untouched', () => {
    const tracker = new ColumnTypeTracker(3);
    tracker.observeRow(['1', '2', '3']);
    tracker.observeRow(['4']);
    expect(tracker.snapshot()).toEqual(['INTEGER', 'INTEGER', 'INTEGER']);
  });

  it('should drop cells past the header', () => {
    const tracker = new ColumnTypeTracker(1);
    tracker.observeRow(['1', 'extra']);
    tracker.observe(5, 'ignored');
    expect(tracker.snapshot()).toEqual(['INTEGER']);
  });

  it('should resolve columns without evidence to TEXT', () => {
    const tracker = new ColumnTypeTracker(2);
    tracker.observeRow(['', '7']);
    tracker.observeRow(['', '']);
    expect(tracker.finalize()).toEqual(['TEXT', 'INTEGER']);
  });

  it('should report each promotion once', () => {
    const onPromote = vi.fn();
    const tracker = new ColumnTypeTracker(1, onPromote);
    for (const value of ['1', '2', '2.5', '3', 'n/a', '4']) {
      tracker.observe(0, value);
    }
    expect(onPromote.mock.calls).toEqual([
      [0, 'UNKNOWN', 'INTEGER'],
      [0, 'INTEGER', 'REAL'],
      [0, 'REAL', 'TEXT'],
    ]);
  });

  it('should return the same frozen result on repeated finalize()', () => {
    const tracker = new ColumnTypeTracker(1);
    tracker.observe(0, '1');
    const first = tracker.finalize();
    expect(tracker.finalize()).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('should reject values after finalize()', () => {
    const tracker = new ColumnTypeTracker(1);
    tracker.finalize();
    expect(() => tracker.observe(0, '1')).toThrow('cannot observe values after finalize()');
  });
});
