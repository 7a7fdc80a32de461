import type { Coordinate, ShipSnapshot, ShipView } from './types';
import { BattleshipError, invariantViolation } from './errors';
import { sameCoordinate } from './helpers';

export class Ship {
  readonly footprint: readonly Coordinate[];
  private readonly hitFlags: boolean[];

  constructor(
    readonly id: string,
    readonly name: string,
    footprint: readonly Coordinate[],
  ) {
    if (footprint.length === 0) {
      throw new BattleshipError(`Ship ${id} has an empty footprint`, 'INVALID_PLACEMENT');
    }
    this.footprint = footprint.map((c) => ({ row: c.row, col: c.col }));
    this.hitFlags = this.footprint.map(() => false);
  }

  get size(): number {
    return this.footprint.length;
  }

  get hits(): Coordinate[] {
    return this.footprint.filter((_, i) => this.hitFlags[i]);
  }

  occupies(coord: Coordinate): boolean {
    return this.segmentIndex(coord) !== -1;
  }

  registerHit(coord: Coordinate): void {
    const index = this.segmentIndex(coord);
    if (index === -1) {
      throw invariantViolation(
        `Hit at ${coord.row},${coord.col} routed to ship ${this.id}, which does not occupy it`,
        'NOT_IN_FOOTPRINT',
      );
    }
    this.hitFlags[index] = true;
  }

  isSunk(): boolean {
    return this.hitFlags.every(Boolean);
  }

  toSnapshot(): ShipSnapshot {
    return {
      id: this.id,
      name: this.name,
      footprint: this.footprint.map((c) => ({ row: c.row, col: c.col })),
    };
  }

  toView(): ShipView {
    return {
      id: this.id,
      name: this.name,
      size: this.size,
      positions: this.footprint.map((c) => ({ row: c.row, col: c.col })),
      hits: this.hits,
      sunk: this.isSunk(),
    };
  }

  static fromSnapshot(snapshot: ShipSnapshot): Ship {
    return new Ship(snapshot.id, snapshot.name, snapshot.footprint);
  }

  private segmentIndex(coord: Coordinate): number {
    return this.footprint.findIndex((c) => sameCoordinate(c, coord));
  }
}

/** How a grid hands its ships out: hits only land through `Grid.fire`. */
export type ReadonlyShip = Omit<Ship, 'registerHit'>;
