export type BattleshipErrorCode =
  | 'INVALID_PLACEMENT'
  | 'OUT_OF_BOUNDS'
  | 'ALREADY_FIRED'
  | 'NOT_IN_FOOTPRINT'
  | 'NO_TARGETS'
  | 'INVALID_PHASE';

export class BattleshipError extends Error {
  constructor(message: string, public code: BattleshipErrorCode, public status: number = 400) {
    super(message);
    this.name = 'BattleshipError';
  }
}

/**
 * Invariant violations: the caller (usually the computer's strategy) broke the
 * targeting contract. These map to a 500 rather than a user-facing error.
 */
export function invariantViolation(message: string, code: BattleshipErrorCode): BattleshipError {
  return new BattleshipError(message, code, 500);
}
