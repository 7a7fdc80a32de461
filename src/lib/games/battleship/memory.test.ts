import { describe, expect, it } from 'vitest';
import { TargetMemory } from './memory';
import { BattleshipError } from './errors';

const DIMS = { rows: 5, cols: 5 };

describe('TargetMemory', () => {
  it('starts empty and hunting', () => {
    const memory = new TargetMemory(DIMS);
    expect(memory.firedCount).toBe(0);
    expect(memory.pending).toEqual([]);
    expect(memory.mode).toBe('hunting');
  });

  it('records shots in order and refuses to record one twice', () => {
    const memory = new TargetMemory(DIMS);
    memory.recordShot({ row: 1, col: 1 });
    memory.recordShot({ row: 0, col: 4 });
    expect(memory.fired).toEqual([{ row: 1, col: 1 }, { row: 0, col: 4 }]);
    expect(memory.hasFired({ row: 0, col: 4 })).toBe(true);

    let caught: unknown;
    try {
      memory.recordShot({ row: 1, col: 1 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(BattleshipError);
    expect(caught).toMatchObject({ code: 'ALREADY_FIRED', status: 500 });
    expect(memory.firedCount).toBe(2);
  });

  it('never queues a cell twice, a fired cell or an off-grid cell', () => {
    const memory = new TargetMemory(DIMS);
    memory.recordShot({ row: 2, col: 2 });
    expect(memory.enqueue({ row: 2, col: 3 })).toBe(true);
    expect(memory.enqueue({ row: 2, col: 3 })).toBe(false);
    expect(memory.enqueue({ row: 2, col: 2 })).toBe(false);
    expect(memory.enqueue({ row: 5, col: 0 })).toBe(false);
    expect(memory.pending).toEqual([{ row: 2, col: 3 }]);
    expect(memory.mode).toBe('probing');
  });

  it('drops a queued cell once it is fired', () => {
    const memory = new TargetMemory(DIMS);
    memory.enqueue({ row: 0, col: 1 });
    memory.enqueue({ row: 1, col: 0 });
    memory.recordShot({ row: 0, col: 1 });
    expect(memory.pending).toEqual([{ row: 1, col: 0 }]);
  });

  it('dequeues first in, first out', () => {
    const memory = new TargetMemory(DIMS);
    memory.enqueue({ row: 0, col: 1 });
    memory.enqueue({ row: 1, col: 0 });
    expect(memory.dequeue()).toEqual({ row: 0, col: 1 });
    expect(memory.dequeue()).toEqual({ row: 1, col: 0 });
    expect(memory.dequeue()).toBeUndefined();
    expect(memory.mode).toBe('hunting');
  });

  it('moves prioritized cells to the front in the given order', () => {
    const memory = new TargetMemory(DIMS);
    memory.enqueue({ row: 0, col: 1 });
    memory.enqueue({ row: 1, col: 3 });
    memory.enqueue({ row: 2, col: 1 });
    memory.recordShot({ row: 4, col: 4 });

    memory.prioritize([{ row: 1, col: 3 }, { row: 1, col: 0 }, { row: 4, col: 4 }, { row: 1, col: 0 }]);
    expect(memory.pending).toEqual([
      { row: 1, col: 3 },
      { row: 1, col: 0 },
      { row: 0, col: 1 },
      { row: 2, col: 1 },
    ]);
  });

  it('tracks unresolved hits without duplicates', () => {
    const memory = new TargetMemory(DIMS);
    memory.recordHit({ row: 1, col: 1 });
    memory.recordHit({ row: 1, col: 1 });
    memory.recordHit({ row: 1, col: 2 });
    expect(memory.unresolvedHits).toEqual([{ row: 1, col: 1 }, { row: 1, col: 2 }]);
    memory.clearHits();
    expect(memory.unresolvedHits).toEqual([]);
  });

  it('forgets everything on reset', () => {
    const memory = new TargetMemory(DIMS);
    memory.recordShot({ row: 0, col: 0 });
    memory.enqueue({ row: 0, col: 1 });
    memory.recordHit({ row: 0, col: 0 });
    memory.reset();
    expect(memory.firedCount).toBe(0);
    expect(memory.hasFired({ row: 0, col: 0 })).toBe(false);
    expect(memory.pending).toEqual([]);
    expect(memory.unresolvedHits).toEqual([]);
  });

  it('survives a snapshot round trip', () => {
    const memory = new TargetMemory(DIMS);
    memory.recordShot({ row: 3, col: 3 });
    memory.recordShot({ row: 0, col: 0 });
    memory.recordHit({ row: 3, col: 3 });
    memory.enqueue({ row: 2, col: 3 });
    memory.enqueue({ row: 4, col: 3 });

    const restored = TargetMemory.fromSnapshot(JSON.parse(JSON.stringify(memory.toSnapshot())));
    expect(restored.dimensions).toEqual(DIMS);
    expect(restored.fired).toEqual(memory.fired);
    expect(restored.pending).toEqual(memory.pending);
    expect(restored.unresolvedHits).toEqual(memory.unresolvedHits);
  });
});
