import type {
  CellState,
  Coordinate,
  GridDimensions,
  GridOptions,
  GridSnapshot,
  ShotOutcome,
} from './types';
import { BattleshipError } from './errors';
import { Ship } from './ship';
import type { ReadonlyShip } from './ship';
import { coordKey, formatCoordinate, inBounds, surroundingCells } from './helpers';

/**
 * One side's board. `place` is only used during setup; after that `fire` is the
 * single entry point that changes cell state.
 */
export class Grid {
  readonly rows: number;
  readonly cols: number;
  readonly allowTouching: boolean;

  private readonly cells: CellState[][];
  private readonly fleet: Ship[] = [];
  private readonly owners = new Map<string, Ship>();
  private readonly shotLog: Coordinate[] = [];

  constructor(dims: GridDimensions, options: GridOptions = {}) {
    if (!Number.isInteger(dims.rows) || !Number.isInteger(dims.cols) || dims.rows < 1 || dims.cols < 1) {
      throw new RangeError(`Invalid grid dimensions ${dims.rows}x${dims.cols}`);
    }
    this.rows = dims.rows;
    this.cols = dims.cols;
    this.allowTouching = options.allowTouching ?? true;
    this.cells = Array.from({ length: dims.rows }, () =>
      Array.from({ length: dims.cols }, (): CellState => 'empty'),
    );
  }

  get dimensions(): GridDimensions {
    return { rows: this.rows, cols: this.cols };
  }

  get ships(): readonly ReadonlyShip[] {
    return this.fleet;
  }

  /** Coordinates fired at, in firing order. */
  get shots(): Coordinate[] {
    return this.shotLog.map((c) => ({ row: c.row, col: c.col }));
  }

  // --- Placement ---

  /** Returns the reason a footprint cannot be placed, or null if it can. */
  placementProblem(footprint: readonly Coordinate[]): string | null {
    if (footprint.length === 0) return 'empty footprint';
    const own = new Set<string>();
    for (const pos of footprint) {
      if (!inBounds(pos, this.dimensions)) return `${pos.row},${pos.col} is out of bounds`;
      const key = coordKey(pos);
      if (own.has(key)) return `${formatCoordinate(pos)} is repeated`;
      own.add(key);
      if (this.owners.has(key)) return `${formatCoordinate(pos)} is already occupied`;
    }
    if (!this.allowTouching) {
      for (const pos of footprint) {
        for (const around of surroundingCells(pos, this.dimensions)) {
          const key = coordKey(around);
          if (!own.has(key) && this.owners.has(key)) {
            return `${formatCoordinate(pos)} touches another ship`;
          }
        }
      }
    }
    return null;
  }

  canPlace(footprint: readonly Coordinate[]): boolean {
    return this.placementProblem(footprint) === null;
  }

  place(ship: Ship): void {
    const problem = this.placementProblem(ship.footprint);
    if (problem) {
      throw new BattleshipError(`Cannot place ${ship.name}: ${problem}`, 'INVALID_PLACEMENT');
    }
    for (const pos of ship.footprint) {
      this.cells[pos.row][pos.col] = 'ship';
      this.owners.set(coordKey(pos), ship);
    }
    this.fleet.push(ship);
  }

  // --- Play ---

  fire(coord: Coordinate): ShotOutcome {
    if (!inBounds(coord, this.dimensions)) {
      throw new BattleshipError(`${coord.row},${coord.col} is outside the grid`, 'OUT_OF_BOUNDS');
    }
    const state = this.cells[coord.row][coord.col];
    if (state === 'hit' || state === 'miss') {
      throw new BattleshipError(`${formatCoordinate(coord)} has already been fired at`, 'ALREADY_FIRED', 409);
    }

    this.shotLog.push({ row: coord.row, col: coord.col });

    if (state === 'empty') {
      this.cells[coord.row][coord.col] = 'miss';
      return { result: 'miss' };
    }

    this.cells[coord.row][coord.col] = 'hit';
    const ship = this.owners.get(coordKey(coord));
    if (!ship) {
      throw new Error(`Cell ${coordKey(coord)} is marked as ship but has no owner`);
    }
    ship.registerHit(coord);
    return { result: 'hit', shipSunk: ship.isSunk() };
  }

  allShipsSunk(): boolean {
    return this.fleet.every((s) => s.isSunk());
  }

  shipsRemaining(): number {
    return this.fleet.filter((s) => !s.isSunk()).length;
  }

  // --- Queries ---

  getCell(coord: Coordinate): CellState {
    if (!inBounds(coord, this.dimensions)) {
      throw new BattleshipError(`${coord.row},${coord.col} is outside the grid`, 'OUT_OF_BOUNDS');
    }
    return this.cells[coord.row][coord.col];
  }

  hasBeenFiredAt(coord: Coordinate): boolean {
    const state = this.getCell(coord);
    return state === 'hit' || state === 'miss';
  }

  cellsInState(state: CellState): Coordinate[] {
    const found: Coordinate[] = [];
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        if (this.cells[row][col] === state) found.push({ row, col });
      }
    }
    return found;
  }

  shipAt(coord: Coordinate): ReadonlyShip | undefined {
    return this.owners.get(coordKey(coord));
  }

  /** Read view. Undamaged ship cells read as empty unless revealed. */
  toView(revealShips: boolean): CellState[][] {
    return this.cells.map((row) =>
      row.map((cell) => (cell === 'ship' && !revealShips ? 'empty' : cell)),
    );
  }

  // --- Session store ---

  toSnapshot(): GridSnapshot {
    return {
      rows: this.rows,
      cols: this.cols,
      allowTouching: this.allowTouching,
      ships: this.fleet.map((s) => s.toSnapshot()),
      shots: this.shots,
    };
  }

  static fromSnapshot(snapshot: GridSnapshot): Grid {
    const grid = new Grid(
      { rows: snapshot.rows, cols: snapshot.cols },
      { allowTouching: snapshot.allowTouching },
    );
    for (const ship of snapshot.ships) {
      grid.place(Ship.fromSnapshot(ship));
    }
    for (const shot of snapshot.shots) {
      grid.fire(shot);
    }
    return grid;
  }
}
