/**
 * History Manager Unit Tests
 * @module history/__tests__/history-manager.test
 *
 * Uses a counter aspect so the stack mechanics are tested apart from
 * partitions.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { HistoryManager, type UndoableAspect } from '../history-manager.js';
import { EmptyHistoryError } from '../../errors/index.js';

interface Step {
  readonly label: string;
  readonly delta: number;
}

class Counter implements UndoableAspect<Step> {
  public readonly aspectName: string;
  public value = 0;
  public readonly calls: string[] = [];

  constructor(name: string) {
    this.aspectName = name;
  }

  add(delta: number): Step {
    this.value += delta;
    return { label: `${this.aspectName}+${delta}`, delta };
  }

  revert(record: Step): Step {
    this.value -= record.delta;
    this.calls.push(`revert ${record.label}`);
    return { label: `undo ${record.label}`, delta: -record.delta };
  }

  reapply(record: Step): Step {
    this.value += record.delta;
    this.calls.push(`reapply ${record.label}`);
    return { label: `redo ${record.label}`, delta: record.delta };
  }
}

const joinLabels = (records: readonly Step[]): Step | null =>
  records.length === 0
    ? null
    : {
        label: records.map((r) => r.label).join(' & '),
        delta: records.reduce((sum, r) => sum + r.delta, 0),
      };

describe('HistoryManager', () => {
  let history: HistoryManager<Step>;
  let a: Counter;
  let b: Counter;

  beforeEach(() => {
    history = new HistoryManager<Step>({ combine: joinLabels });
    a = new Counter('a');
    b = new Counter('b');
  });

  it('should start empty', () => {
    expect(history.size).toBe(0);
    expect(history.position).toBe(0);
    expect(history.canUndo).toBe(false);
    expect(history.canRedo).toBe(false);
    expect(() => history.undo()).toThrow(EmptyHistoryError);
    expect(() => history.redo()).toThrow(EmptyHistoryError);
  });

  it('should ignore an empty result list', () => {
    expect(history.record([])).toBeNull();
    expect(history.size).toBe(0);
  });

  it('should return the combined record when recording', () => {
    const combined = history.record([
      { source: a, record: a.add(2) },
      { source: b, record: b.add(5) },
    ]);

    expect(combined).toEqual({ label: 'a+2 & b+5', delta: 7 });
    expect(history.position).toBe(1);
  });

  it('should revert results in reverse order and combine the inverses', () => {
    history.record([
      { source: a, record: a.add(2) },
      { source: b, record: b.add(5) },
    ]);

    const undone = history.undo();

    expect(undone).toEqual({ label: 'undo b+5 & undo a+2', delta: -7 });
    expect([...b.calls, ...a.calls]).toEqual(['revert b+5', 'revert a+2']);
    expect(a.value).toBe(0);
    expect(b.value).toBe(0);
    expect(history.canRedo).toBe(true);
  });

  it('should reapply results in order on redo', () => {
    history.record([
      { source: a, record: a.add(2) },
      { source: b, record: b.add(5) },
    ]);
    history.undo();

    const redone = history.redo();

    expect(redone).toEqual({ label: 'redo a+2 & redo b+5', delta: 7 });
    expect(a.value).toBe(2);
    expect(b.value).toBe(5);
    expect(history.canRedo).toBe(false);
  });

  it('should discard the redo tail when a new action is recorded', () => {
    history.record([{ source: a, record: a.add(1) }]);
    history.record([{ source: a, record: a.add(10) }]);
    history.undo();

    history.record([{ source: a, record: a.add(100) }]);

    expect(history.size).toBe(2);
    expect(history.canRedo).toBe(false);
    expect(history.appliedEntries().map((entry) => entry.combined.label)).toEqual(['a+1', 'a+100']);
    expect(() => history.redo()).toThrow(EmptyHistoryError);
  });

  it('should replay applied entries to the live value', () => {
    history.record([{ source: a, record: a.add(3) }]);
    history.record([{ source: a, record: a.add(4) }]);
    history.record([{ source: a, record: a.add(5) }]);
    history.undo();

    const replayed = history
      .appliedEntries()
      .reduce((sum, entry) => sum + entry.combined.delta, 0);

    expect(replayed).toBe(a.value);
    expect(a.value).toBe(7);
  });

  it('should tag EmptyHistoryError with the direction', () => {
    try {
      history.undo();
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(EmptyHistoryError);
      if (error instanceof EmptyHistoryError) {
        expect(error.direction).toBe('undo');
        expect(error.code).toBe('EMPTY_HISTORY');
      }
    }
  });

  it('should clear entries and cursor', () => {
    history.record([{ source: a, record: a.add(1) }]);

    history.clear();

    expect(history.size).toBe(0);
    expect(history.canUndo).toBe(false);
  });

  it('should log moves at debug level', () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const logged = new HistoryManager<Step>({ combine: joinLabels, logger });

    logged.record([{ source: a, record: a.add(1) }]);
    logged.undo();

    expect(logger.debug).toHaveBeenLastCalledWith({ position: 0, size: 1 }, 'History undo');
  });
});
