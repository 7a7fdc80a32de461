import type { Coordinate, GridDimensions, TargetingMode, TargetMemorySnapshot } from './types';
import { invariantViolation } from './errors';
import { coordKey, formatCoordinate, inBounds, sameCoordinate } from './helpers';

/**
 * What the computer knows about the opponent's board: where it has fired, which
 * cells it wants to try next, and the hits it has not yet resolved into a sunk
 * ship. One instance per AI per game.
 */
export class TargetMemory {
  private readonly firedKeys = new Set<string>();
  private firedOrder: Coordinate[] = [];
  private queue: Coordinate[] = [];
  private hits: Coordinate[] = [];

  constructor(readonly dimensions: GridDimensions) {}

  // --- Fired set ---

  hasFired(coord: Coordinate): boolean {
    return this.firedKeys.has(coordKey(coord));
  }

  /** Called by whoever fires, right after the shot resolves. */
  recordShot(coord: Coordinate): void {
    const key = coordKey(coord);
    if (this.firedKeys.has(key)) {
      throw invariantViolation(`${formatCoordinate(coord)} was already recorded as fired`, 'ALREADY_FIRED');
    }
    this.firedKeys.add(key);
    this.firedOrder.push({ row: coord.row, col: coord.col });
    this.queue = this.queue.filter((c) => !sameCoordinate(c, coord));
  }

  get fired(): Coordinate[] {
    return this.firedOrder.map((c) => ({ row: c.row, col: c.col }));
  }

  get firedCount(): number {
    return this.firedOrder.length;
  }

  // --- Priority queue ---

  isQueued(coord: Coordinate): boolean {
    return this.queue.some((c) => sameCoordinate(c, coord));
  }

  enqueue(coord: Coordinate): boolean {
    if (!inBounds(coord, this.dimensions) || this.hasFired(coord) || this.isQueued(coord)) return false;
    this.queue.push({ row: coord.row, col: coord.col });
    return true;
  }

  /** Moves (or inserts) the given cells to the front, keeping their order. */
  prioritize(coords: Coordinate[]): void {
    const front: Coordinate[] = [];
    for (const coord of coords) {
      if (!inBounds(coord, this.dimensions) || this.hasFired(coord) || front.some((c) => sameCoordinate(c, coord))) continue;
      front.push({ row: coord.row, col: coord.col });
    }
    const rest = this.queue.filter((c) => !front.some((f) => sameCoordinate(f, c)));
    this.queue = [...front, ...rest];
  }

  dequeue(): Coordinate | undefined {
    return this.queue.shift();
  }

  clearQueue(): void {
    this.queue = [];
  }

  get pending(): Coordinate[] {
    return this.queue.map((c) => ({ row: c.row, col: c.col }));
  }

  get mode(): TargetingMode {
    return this.queue.length > 0 ? 'probing' : 'hunting';
  }

  // --- Unresolved hits ---

  recordHit(coord: Coordinate): void {
    if (this.hits.some((c) => sameCoordinate(c, coord))) return;
    this.hits.push({ row: coord.row, col: coord.col });
  }

  clearHits(): void {
    this.hits = [];
  }

  get unresolvedHits(): Coordinate[] {
    return this.hits.map((c) => ({ row: c.row, col: c.col }));
  }

  // --- Lifecycle ---

  reset(): void {
    this.firedKeys.clear();
    this.firedOrder = [];
    this.queue = [];
    this.hits = [];
  }

  toSnapshot(): TargetMemorySnapshot {
    return {
      rows: this.dimensions.rows,
      cols: this.dimensions.cols,
      fired: this.fired,
      queue: this.pending,
      unresolvedHits: this.unresolvedHits,
    };
  }

  static fromSnapshot(snapshot: TargetMemorySnapshot): TargetMemory {
    const memory = new TargetMemory({ rows: snapshot.rows, cols: snapshot.cols });
    for (const coord of snapshot.fired) memory.recordShot(coord);
    for (const coord of snapshot.queue) memory.enqueue(coord);
    for (const coord of snapshot.unresolvedHits) memory.recordHit(coord);
    return memory;
  }
}
