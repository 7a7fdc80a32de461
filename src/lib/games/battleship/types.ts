// --- Battleship Game Types ---

export interface Coordinate {
  row: number;
  col: number;
}

export interface GridDimensions {
  rows: number;
  cols: number;
}

export type CellState = 'empty' | 'ship' | 'hit' | 'miss';

/** What the shooter learns from a shot. Strategies only ever see this. */
export type ShotOutcome =
  | { result: 'miss' }
  | { result: 'hit'; shipSunk: boolean };

export type Difficulty = 'easy' | 'medium' | 'hard';

export type StrategyKind = 'random-shooter' | 'seek-and-destroy' | 'strategic-genius';

export type PresetName = 'small' | 'medium' | 'big';

export type Parity = 0 | 1;

export type TargetingMode = 'hunting' | 'probing';

export type Side = 'player' | 'computer';

export interface ShipTemplate {
  id: string;
  name: string;
  size: number;
}

export interface BoardPreset {
  gridSize: number;
  ships: ShipTemplate[];
}

export interface ShipPlacement {
  shipId: string;
  start: Coordinate;
  orientation: 'horizontal' | 'vertical';
}

export interface GridOptions {
  /** When false, ships may not touch another ship, diagonals included. */
  allowTouching?: boolean;
}

// --- Snapshots (session store) ---

export interface ShipSnapshot {
  id: string;
  name: string;
  footprint: Coordinate[];
}

export interface GridSnapshot {
  rows: number;
  cols: number;
  allowTouching: boolean;
  ships: ShipSnapshot[];
  shots: Coordinate[];
}

export interface TargetMemorySnapshot {
  rows: number;
  cols: number;
  fired: Coordinate[];
  queue: Coordinate[];
  unresolvedHits: Coordinate[];
}

export interface ShotReport {
  shooter: Side;
  row: number;
  col: number;
  label: string;
  result: 'hit' | 'miss' | 'sunk';
  shipName?: string;
}

export interface BattleshipGameRecord {
  gameCode: string;
  playerId: string;
  createdAt: number;
  preset: PresetName;
  difficulty: Difficulty;
  seed: number;
  phase: 'playing' | 'game_over';
  winner: Side | null;
  boards: Record<Side, GridSnapshot>;
  ai: {
    memory: TargetMemorySnapshot;
    rngState: number;
    parity: Parity;
  };
  shotHistory: ShotReport[];
  lastShots: ShotReport[];
}

// --- Read views ---

export interface ShipView {
  id: string;
  name: string;
  size: number;
  positions: Coordinate[];
  hits: Coordinate[];
  sunk: boolean;
}

export interface SanitizedBattleshipState {
  gameCode: string;
  phase: 'playing' | 'game_over';
  preset: PresetName;
  difficulty: Difficulty;
  gridSize: GridDimensions;
  myBoard: {
    cells: CellState[][];
    ships: ShipView[];
  };
  opponentBoard: {
    cells: CellState[][];
    sunkShips: ShipView[];
    shipsRemaining: number;
  };
  winner: Side | null;
  lastShots: ShotReport[];
  shotsFired: number;
  opponentShips?: ShipView[];
}
