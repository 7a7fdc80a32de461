export {
  initializeGame,
  restartGame,
  processTurn,
  sanitizeForPlayer,
  buildFleet,
} from './engine';
export type { NewGameOptions, TurnResult } from './engine';
export {
  createStrategy,
  createRandomShooter,
  createSeekAndDestroy,
  createStrategicGenius,
  generateFleetPlacement,
} from './bots';
export type { TargetingStrategy } from './bots';
export { Grid } from './grid';
export { Ship } from './ship';
export type { ReadonlyShip } from './ship';
export { TargetMemory } from './memory';
export { BattleshipError } from './errors';
export type { BattleshipErrorCode } from './errors';
export { formatCoordinate, expandPlacement, parsePlacements } from './helpers';
export type {
  BattleshipGameRecord,
  SanitizedBattleshipState,
  CellState,
  Coordinate,
  Difficulty,
  GridDimensions,
  PresetName,
  ShipPlacement,
  ShipTemplate,
  ShotOutcome,
  ShotReport,
} from './types';
export {
  BOARD_PRESETS,
  DIFFICULTIES,
  PRESET_NAMES,
  STRATEGY_BY_DIFFICULTY,
  DEFAULT_PRESET,
  DEFAULT_DIFFICULTY,
  isDifficulty,
  isPresetName,
} from './constants';
