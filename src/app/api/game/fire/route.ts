import { NextResponse } from 'next/server';
import { getGame, atomicGameUpdate } from '@/lib/redis';
import { apiError, engineError, gameNotFound, invalidPhase, raceCondition, unauthorized } from '@/lib/errors';
import { processTurn, sanitizeForPlayer } from '@/lib/games/battleship';
import type { TurnResult } from '@/lib/games/battleship';

export async function POST(request: Request) {
  let body: { gameCode?: unknown; playerId?: unknown; row?: unknown; col?: unknown };
  try {
    body = (await request.json()) ?? {};
  } catch {
    return apiError('Invalid request body', 'INVALID_REQUEST', 400);
  }

  const gameCode = typeof body.gameCode === 'string' ? body.gameCode.trim().toUpperCase() : '';
  const playerId = typeof body.playerId === 'string' ? body.playerId.trim() : '';

  if (!gameCode || !playerId) {
    return apiError('Game code and player ID are required', 'INVALID_REQUEST', 400);
  }

  const { row, col } = body;
  if (typeof row !== 'number' || typeof col !== 'number' || !Number.isInteger(row) || !Number.isInteger(col)) {
    return apiError('Row and column must be integers', 'INVALID_REQUEST', 400);
  }

  const game = await getGame(gameCode);
  if (!game) return gameNotFound();

  if (game.playerId !== playerId) return unauthorized();
  if (game.phase !== 'playing') return invalidPhase();

  let turn: TurnResult;
  try {
    turn = processTurn(game, { row, col });
  } catch (err) {
    return engineError(err, `Turn failed in game ${gameCode}`);
  }

  const shotCountBefore = game.shotHistory.length;
  const updated = await atomicGameUpdate(gameCode, (current) => {
    // Another shot landed since we read the game
    if (current.shotHistory.length !== shotCountBefore) return null;
    return turn.record;
  });

  if (!updated) return raceCondition();

  return NextResponse.json({ shots: turn.shots, game: sanitizeForPlayer(updated) });
}
