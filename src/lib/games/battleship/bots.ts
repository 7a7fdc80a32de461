import type {
  Coordinate,
  Difficulty,
  GridDimensions,
  GridOptions,
  Parity,
  ShipPlacement,
  ShipTemplate,
  ShotOutcome,
  StrategyKind,
} from './types';
import type { SeededRandom } from '@/lib/random';
import type { TargetMemory } from './memory';
import { MAX_PLACEMENT_ATTEMPTS, STRATEGY_BY_DIFFICULTY } from './constants';
import { BattleshipError, invariantViolation } from './errors';
import { Grid } from './grid';
import { Ship } from './ship';
import { allCells, coordKey, expandPlacement, inBounds, orthogonalNeighbours } from './helpers';

// --- Fleet placement ---

/**
 * Generate a valid random fleet placement for the computer (or for a player who
 * did not send one). Places ships largest-first with random orientation.
 */
export function generateFleetPlacement(
  dims: GridDimensions,
  templates: ShipTemplate[],
  random: SeededRandom,
  options: GridOptions = {},
): ShipPlacement[] {
  const scratch = new Grid(dims, options);
  const placements: ShipPlacement[] = [];

  // Sort largest first for better packing
  const sorted = [...templates].sort((a, b) => b.size - a.size);

  for (const template of sorted) {
    let placed = false;
    let attempts = 0;

    while (!placed && attempts < MAX_PLACEMENT_ATTEMPTS) {
      attempts++;
      const orientation: ShipPlacement['orientation'] = random.next() < 0.5 ? 'horizontal' : 'vertical';
      const maxRow = orientation === 'vertical' ? dims.rows - template.size : dims.rows - 1;
      const maxCol = orientation === 'horizontal' ? dims.cols - template.size : dims.cols - 1;
      if (maxRow < 0 || maxCol < 0) continue;

      const placement: ShipPlacement = {
        shipId: template.id,
        start: { row: random.nextInt(maxRow + 1), col: random.nextInt(maxCol + 1) },
        orientation,
      };
      const footprint = expandPlacement(placement, template.size);

      if (scratch.canPlace(footprint)) {
        scratch.place(new Ship(template.id, template.name, footprint));
        placements.push(placement);
        placed = true;
      }
    }

    if (!placed) {
      throw new BattleshipError(
        `Could not fit ${template.name} on a ${dims.rows}x${dims.cols} grid`,
        'INVALID_PLACEMENT',
      );
    }
  }

  return placements;
}

// --- Targeting strategies ---

/**
 * The caller fires at the returned cell, records it with `memory.recordShot`,
 * then hands the outcome to `processResult`. Strategies never see the opponent's
 * grid, only the outcome stream.
 */
export interface TargetingStrategy {
  readonly kind: StrategyKind;
  chooseTarget(memory: TargetMemory, dims: GridDimensions): Coordinate;
  processResult(memory: TargetMemory, coord: Coordinate, outcome: ShotOutcome): void;
}

function pickUntried(
  memory: TargetMemory,
  dims: GridDimensions,
  random: SeededRandom,
  filter?: (coord: Coordinate) => boolean,
): Coordinate | null {
  const candidates = allCells(dims, (c) => !memory.hasFired(c) && (!filter || filter(c)));
  if (candidates.length === 0) return null;
  return random.pick(candidates);
}

function noTargets(dims: GridDimensions): BattleshipError {
  return invariantViolation(`Every cell of the ${dims.rows}x${dims.cols} grid has been fired at`, 'NO_TARGETS');
}

function nextQueued(memory: TargetMemory, dims: GridDimensions): Coordinate | undefined {
  let next = memory.dequeue();
  while (next && (memory.hasFired(next) || !inBounds(next, dims))) {
    next = memory.dequeue();
  }
  return next;
}

function enqueueNeighbours(memory: TargetMemory, coord: Coordinate, dims: GridDimensions): void {
  for (const n of orthogonalNeighbours(coord, dims)) {
    memory.enqueue(n);
  }
}

export function createRandomShooter(random: SeededRandom): TargetingStrategy {
  return {
    kind: 'random-shooter',
    chooseTarget(memory, dims) {
      const target = pickUntried(memory, dims, random);
      if (!target) throw noTargets(dims);
      return target;
    },
    processResult() {
      // Stateless
    },
  };
}

export function createSeekAndDestroy(random: SeededRandom): TargetingStrategy {
  return {
    kind: 'seek-and-destroy',
    chooseTarget(memory, dims) {
      const queued = nextQueued(memory, dims);
      if (queued) return queued;
      const target = pickUntried(memory, dims, random);
      if (!target) throw noTargets(dims);
      return target;
    },
    processResult(memory, coord, outcome) {
      if (outcome.result === 'miss') return;
      if (outcome.shipSunk) {
        memory.clearQueue();
        return;
      }
      enqueueNeighbours(memory, coord, memory.dimensions);
    },
  };
}

// --- Line inference (hard) ---

interface HitLine {
  cells: Coordinate[];
  orientation: 'horizontal' | 'vertical';
}

function findLineThrough(hits: Coordinate[], coord: Coordinate): HitLine | null {
  const hitSet = new Set(hits.map(coordKey));

  const row: Coordinate[] = [coord];
  for (let c = coord.col + 1; hitSet.has(`${coord.row},${c}`); c++) row.push({ row: coord.row, col: c });
  for (let c = coord.col - 1; hitSet.has(`${coord.row},${c}`); c--) row.push({ row: coord.row, col: c });
  if (row.length >= 2) return { cells: row, orientation: 'horizontal' };

  const col: Coordinate[] = [coord];
  for (let r = coord.row + 1; hitSet.has(`${r},${coord.col}`); r++) col.push({ row: r, col: coord.col });
  for (let r = coord.row - 1; hitSet.has(`${r},${coord.col}`); r--) col.push({ row: r, col: coord.col });
  if (col.length >= 2) return { cells: col, orientation: 'vertical' };

  return null;
}

/**
 * The two cells that would extend the line, "ahead" first: ahead is the end the
 * latest hit sits on, so the probe keeps moving the way it was going.
 */
function lineExtensions(line: HitLine, latest: Coordinate): Coordinate[] {
  if (line.orientation === 'horizontal') {
    const cols = line.cells.map((c) => c.col);
    const min = Math.min(...cols);
    const max = Math.max(...cols);
    const low = { row: latest.row, col: min - 1 };
    const high = { row: latest.row, col: max + 1 };
    return latest.col === min && latest.col !== max ? [low, high] : [high, low];
  }
  const rows = line.cells.map((c) => c.row);
  const min = Math.min(...rows);
  const max = Math.max(...rows);
  const low = { row: min - 1, col: latest.col };
  const high = { row: max + 1, col: latest.col };
  return latest.row === min && latest.row !== max ? [low, high] : [high, low];
}

export function createStrategicGenius(random: SeededRandom, parity: Parity = 0): TargetingStrategy {
  return {
    kind: 'strategic-genius',
    chooseTarget(memory, dims) {
      const queued = nextQueued(memory, dims);
      if (queued) return queued;

      // Hunt: checkerboard first, any untried cell once it is exhausted
      const target =
        pickUntried(memory, dims, random, (c) => (c.row + c.col) % 2 === parity) ??
        pickUntried(memory, dims, random);
      if (!target) throw noTargets(dims);
      return target;
    },
    processResult(memory, coord, outcome) {
      if (outcome.result === 'miss') return;
      if (outcome.shipSunk) {
        memory.clearQueue();
        memory.clearHits();
        return;
      }

      memory.recordHit(coord);
      const dims = memory.dimensions;
      const line = findLineThrough(memory.unresolvedHits, coord);
      if (line) {
        const ends = lineExtensions(line, coord).filter((c) => inBounds(c, dims) && !memory.hasFired(c));
        if (ends.length > 0) {
          memory.prioritize(ends);
          return;
        }
      }
      enqueueNeighbours(memory, coord, dims);
    },
  };
}

export function createStrategy(
  difficulty: Difficulty,
  random: SeededRandom,
  options: { parity?: Parity } = {},
): TargetingStrategy {
  const kind = STRATEGY_BY_DIFFICULTY[difficulty];
  switch (kind) {
    case 'random-shooter':
      return createRandomShooter(random);
    case 'seek-and-destroy':
      return createSeekAndDestroy(random);
    case 'strategic-genius':
      return createStrategicGenius(random, options.parity);
  }
}
