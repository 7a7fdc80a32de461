import { NextResponse } from 'next/server';
import type { ApiError } from './types';
import { BattleshipError } from './games/battleship';

export function apiError(
  message: string,
  code: string,
  status: number
): NextResponse<ApiError> {
  return NextResponse.json({ error: message, code }, { status });
}

// Pre-built error helpers for common cases

export function gameNotFound() {
  return apiError('Game not found', 'GAME_NOT_FOUND', 404);
}

export function invalidPhase() {
  return apiError('Invalid action for current phase', 'INVALID_PHASE', 409);
}

export function unauthorized() {
  return apiError('Unauthorized', 'UNAUTHORIZED', 401);
}

export function raceCondition() {
  return apiError('Please try again', 'RACE_CONDITION', 409);
}

export function internalError() {
  return apiError('Something went wrong', 'INTERNAL_ERROR', 500);
}

/**
 * Translate a thrown engine error into a response. Client-caused engine errors
 * keep their code; invariant violations and anything unexpected become a 500.
 */
export function engineError(err: unknown, context: string): NextResponse<ApiError> {
  if (err instanceof BattleshipError && err.status < 500) {
    return apiError(err.message, err.code, err.status);
  }
  console.error(`${context}:`, err);
  return internalError();
}
