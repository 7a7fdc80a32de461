import type {
  BattleshipGameRecord,
  Coordinate,
  Difficulty,
  GridDimensions,
  GridOptions,
  Parity,
  PresetName,
  SanitizedBattleshipState,
  ShipPlacement,
  ShipTemplate,
  ShotOutcome,
  ShotReport,
  Side,
} from './types';
import { SeededRandom } from '@/lib/random';
import { BOARD_PRESETS } from './constants';
import { BattleshipError, invariantViolation } from './errors';
import { Grid } from './grid';
import { Ship } from './ship';
import { TargetMemory } from './memory';
import { createStrategy, generateFleetPlacement } from './bots';
import { expandPlacement, formatCoordinate } from './helpers';

function presetDimensions(preset: PresetName): GridDimensions {
  const size = BOARD_PRESETS[preset].gridSize;
  return { rows: size, cols: size };
}

// --- Fleet setup ---

/**
 * Place a full fleet on a fresh grid. Every template must be placed exactly once.
 */
export function buildFleet(
  dims: GridDimensions,
  templates: ShipTemplate[],
  placements: ShipPlacement[],
  options: GridOptions = {},
): Grid {
  const templateMap = new Map(templates.map((t) => [t.id, t]));
  if (placements.length !== templates.length) {
    throw new BattleshipError(
      `Expected ${templates.length} ships, got ${placements.length}`,
      'INVALID_PLACEMENT',
    );
  }

  const grid = new Grid(dims, options);
  for (const placement of placements) {
    const template = templateMap.get(placement.shipId);
    if (!template) {
      throw new BattleshipError(`Unknown or duplicate ship ${placement.shipId}`, 'INVALID_PLACEMENT');
    }
    templateMap.delete(placement.shipId); // consume, so a repeated id fails
    grid.place(new Ship(template.id, template.name, expandPlacement(placement, template.size)));
  }

  return grid;
}

// --- Game lifecycle ---

export interface NewGameOptions {
  gameCode: string;
  playerId: string;
  preset: PresetName;
  difficulty: Difficulty;
  seed: number;
  placements?: ShipPlacement[];
  now: number;
}

/**
 * Initialize a new game. Pure given its inputs: the seed drives the computer's
 * fleet, the player's fleet when none is supplied, the hunt parity and every
 * later AI choice.
 */
export function initializeGame(options: NewGameOptions): BattleshipGameRecord {
  const { preset, difficulty, seed } = options;
  const dims = presetDimensions(preset);
  const templates = BOARD_PRESETS[preset].ships;
  const random = new SeededRandom(seed);

  const playerPlacements = options.placements ?? generateFleetPlacement(dims, templates, random);
  const playerGrid = buildFleet(dims, templates, playerPlacements);
  const computerGrid = buildFleet(dims, templates, generateFleetPlacement(dims, templates, random));

  const parity: Parity = random.nextInt(2) === 0 ? 0 : 1;

  return {
    gameCode: options.gameCode,
    playerId: options.playerId,
    createdAt: options.now,
    preset,
    difficulty,
    seed,
    phase: 'playing',
    winner: null,
    boards: {
      player: playerGrid.toSnapshot(),
      computer: computerGrid.toSnapshot(),
    },
    ai: {
      memory: new TargetMemory(dims).toSnapshot(),
      rngState: random.state,
      parity,
    },
    shotHistory: [],
    lastShots: [],
  };
}

/**
 * Start over with the same preset and difficulty. The computer's memory starts
 * empty again.
 */
export function restartGame(
  record: BattleshipGameRecord,
  options: { seed: number; placements?: ShipPlacement[]; now: number },
): BattleshipGameRecord {
  return initializeGame({
    gameCode: record.gameCode,
    playerId: record.playerId,
    preset: record.preset,
    difficulty: record.difficulty,
    seed: options.seed,
    placements: options.placements,
    now: options.now,
  });
}

function buildReport(shooter: Side, grid: Grid, coord: Coordinate, outcome: ShotOutcome): ShotReport {
  const report: ShotReport = {
    shooter,
    row: coord.row,
    col: coord.col,
    label: formatCoordinate(coord),
    result: outcome.result === 'miss' ? 'miss' : outcome.shipSunk ? 'sunk' : 'hit',
  };
  if (report.result === 'sunk') {
    report.shipName = grid.shipAt(coord)?.name;
  }
  return report;
}

export interface TurnResult {
  record: BattleshipGameRecord;
  shots: ShotReport[];
}

/**
 * One full turn: the player's shot, then (unless that ended the game) the
 * computer's reply. Returns a new record; the input is left untouched.
 */
export function processTurn(record: BattleshipGameRecord, target: Coordinate): TurnResult {
  if (record.phase !== 'playing') {
    throw new BattleshipError('The game is over', 'INVALID_PHASE', 409);
  }

  const playerGrid = Grid.fromSnapshot(record.boards.player);
  const computerGrid = Grid.fromSnapshot(record.boards.computer);
  const shots: ShotReport[] = [];

  // Player turn
  const playerOutcome = computerGrid.fire(target);
  shots.push(buildReport('player', computerGrid, target, playerOutcome));

  let winner: Side | null = null;
  let ai = record.ai;

  if (computerGrid.allShipsSunk()) {
    winner = 'player';
  } else {
    // Computer turn
    const memory = TargetMemory.fromSnapshot(record.ai.memory);
    const random = new SeededRandom(record.ai.rngState);
    const strategy = createStrategy(record.difficulty, random, { parity: record.ai.parity });

    const aiTarget = strategy.chooseTarget(memory, playerGrid.dimensions);
    if (playerGrid.hasBeenFiredAt(aiTarget)) {
      throw invariantViolation(
        `${strategy.kind} chose ${formatCoordinate(aiTarget)}, which was already fired at`,
        'ALREADY_FIRED',
      );
    }
    const aiOutcome = playerGrid.fire(aiTarget);
    memory.recordShot(aiTarget);
    strategy.processResult(memory, aiTarget, aiOutcome);
    shots.push(buildReport('computer', playerGrid, aiTarget, aiOutcome));

    if (playerGrid.allShipsSunk()) {
      winner = 'computer';
    }

    ai = { memory: memory.toSnapshot(), rngState: random.state, parity: record.ai.parity };
  }

  return {
    record: {
      ...record,
      phase: winner ? 'game_over' : 'playing',
      winner,
      boards: {
        player: playerGrid.toSnapshot(),
        computer: computerGrid.toSnapshot(),
      },
      ai,
      shotHistory: [...record.shotHistory, ...shots],
      lastShots: shots,
    },
    shots,
  };
}

// --- Read view ---

export function sanitizeForPlayer(record: BattleshipGameRecord): SanitizedBattleshipState {
  const playerGrid = Grid.fromSnapshot(record.boards.player);
  const computerGrid = Grid.fromSnapshot(record.boards.computer);
  const gameOver = record.phase === 'game_over';

  const sanitized: SanitizedBattleshipState = {
    gameCode: record.gameCode,
    phase: record.phase,
    preset: record.preset,
    difficulty: record.difficulty,
    gridSize: playerGrid.dimensions,
    myBoard: {
      cells: playerGrid.toView(true),
      ships: playerGrid.ships.map((s) => s.toView()),
    },
    opponentBoard: {
      cells: computerGrid.toView(gameOver),
      sunkShips: computerGrid.ships.filter((s) => s.isSunk()).map((s) => s.toView()),
      shipsRemaining: computerGrid.shipsRemaining(),
    },
    winner: record.winner,
    lastShots: record.lastShots,
    shotsFired: computerGrid.shots.length,
  };

  // On game_over, reveal all opponent ships
  if (gameOver) {
    sanitized.opponentShips = computerGrid.ships.map((s) => s.toView());
  }

  return sanitized;
}
