import type { BoardPreset, Difficulty, PresetName, ShipTemplate, StrategyKind } from './types';

const DESTROYER = { name: 'Destroyer', size: 2 };
const CRUISER = { name: 'Cruiser', size: 3 };
const BATTLESHIP = { name: 'Battleship', size: 4 };

function fleet(...classes: { name: string; size: number }[]): ShipTemplate[] {
  const seen: Record<string, number> = {};
  return classes.map((c) => {
    const base = c.name.toLowerCase();
    seen[base] = (seen[base] ?? 0) + 1;
    return { id: `${base}-${seen[base]}`, name: c.name, size: c.size };
  });
}

export const BOARD_PRESETS: Record<PresetName, BoardPreset> = {
  small: { gridSize: 5, ships: fleet(DESTROYER, DESTROYER, CRUISER) },
  medium: { gridSize: 6, ships: fleet(DESTROYER, DESTROYER, DESTROYER, CRUISER) },
  big: { gridSize: 8, ships: fleet(DESTROYER, DESTROYER, DESTROYER, CRUISER, BATTLESHIP) },
};

export const PRESET_NAMES: readonly PresetName[] = ['small', 'medium', 'big'];

export const DIFFICULTIES: readonly Difficulty[] = ['easy', 'medium', 'hard'];

export const STRATEGY_BY_DIFFICULTY: Record<Difficulty, StrategyKind> = {
  easy: 'random-shooter',
  medium: 'seek-and-destroy',
  hard: 'strategic-genius',
};

export const DEFAULT_PRESET: PresetName = 'small';
export const DEFAULT_DIFFICULTY: Difficulty = 'medium';

// Random fleet placement gives up on a ship after this many tries
export const MAX_PLACEMENT_ATTEMPTS = 1000;

export function isPresetName(value: unknown): value is PresetName {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(BOARD_PRESETS, value);
}

export function isDifficulty(value: unknown): value is Difficulty {
  return typeof value === 'string' && (DIFFICULTIES as readonly string[]).includes(value);
}
