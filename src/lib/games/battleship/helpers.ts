import type { Coordinate, GridDimensions, ShipPlacement } from './types';

const ROW_LABELS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

// Up, down, left, right
const ORTHOGONAL: [number, number][] = [[-1, 0], [1, 0], [0, -1], [0, 1]];

export function coordKey(coord: Coordinate): string {
  return `${coord.row},${coord.col}`;
}

export function sameCoordinate(a: Coordinate, b: Coordinate): boolean {
  return a.row === b.row && a.col === b.col;
}

export function inBounds(coord: Coordinate, dims: GridDimensions): boolean {
  return (
    Number.isInteger(coord.row) &&
    Number.isInteger(coord.col) &&
    coord.row >= 0 &&
    coord.row < dims.rows &&
    coord.col >= 0 &&
    coord.col < dims.cols
  );
}

export function orthogonalNeighbours(coord: Coordinate, dims: GridDimensions): Coordinate[] {
  const neighbours: Coordinate[] = [];
  for (const [dr, dc] of ORTHOGONAL) {
    const next = { row: coord.row + dr, col: coord.col + dc };
    if (inBounds(next, dims)) neighbours.push(next);
  }
  return neighbours;
}

/** The 8 surrounding cells, clipped to the grid. */
export function surroundingCells(coord: Coordinate, dims: GridDimensions): Coordinate[] {
  const cells: Coordinate[] = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const next = { row: coord.row + dr, col: coord.col + dc };
      if (inBounds(next, dims)) cells.push(next);
    }
  }
  return cells;
}

/** Row-major enumeration, optionally filtered. */
export function allCells(
  dims: GridDimensions,
  filter?: (coord: Coordinate) => boolean,
): Coordinate[] {
  const cells: Coordinate[] = [];
  for (let row = 0; row < dims.rows; row++) {
    for (let col = 0; col < dims.cols; col++) {
      const coord = { row, col };
      if (!filter || filter(coord)) cells.push(coord);
    }
  }
  return cells;
}

/** "A1"-style label: letter for the row, 1-based column number. */
export function formatCoordinate(coord: Coordinate): string {
  const letter = ROW_LABELS[coord.row] ?? `R${coord.row + 1}-`;
  return `${letter}${coord.col + 1}`;
}

export function expandPlacement(placement: ShipPlacement, size: number): Coordinate[] {
  const positions: Coordinate[] = [];
  for (let i = 0; i < size; i++) {
    const row = placement.orientation === 'vertical' ? placement.start.row + i : placement.start.row;
    const col = placement.orientation === 'horizontal' ? placement.start.col + i : placement.start.col;
    positions.push({ row, col });
  }
  return positions;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseCoordinateValue(value: unknown): Coordinate | null {
  if (!isRecord(value)) return null;
  const { row, col } = value;
  if (typeof row !== 'number' || typeof col !== 'number') return null;
  if (!Number.isInteger(row) || !Number.isInteger(col)) return null;
  return { row, col };
}

/**
 * Validate the shape of client-sent placements. Bounds, overlaps and fleet
 * completeness are checked later when the fleet is built.
 */
export function parsePlacements(value: unknown): ShipPlacement[] | null {
  if (!Array.isArray(value)) return null;
  const placements: ShipPlacement[] = [];
  for (const item of value) {
    if (!isRecord(item)) return null;
    const { shipId, start, orientation } = item;
    if (typeof shipId !== 'string') return null;
    if (orientation !== 'horizontal' && orientation !== 'vertical') return null;
    const startCoord = parseCoordinateValue(start);
    if (!startCoord) return null;
    placements.push({ shipId, start: startCoord, orientation });
  }
  return placements;
}
