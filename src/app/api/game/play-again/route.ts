import { NextResponse } from 'next/server';
import { getGame, atomicGameUpdate, refreshGameTTL } from '@/lib/redis';
import { parseSeed } from '@/lib/utils';
import { randomSeed } from '@/lib/random';
import { apiError, engineError, gameNotFound, invalidPhase, raceCondition, unauthorized } from '@/lib/errors';
import { parsePlacements, restartGame, sanitizeForPlayer } from '@/lib/games/battleship';
import type { BattleshipGameRecord, ShipPlacement } from '@/lib/games/battleship';

export async function POST(request: Request) {
  let body: { gameCode?: unknown; playerId?: unknown; seed?: unknown; placements?: unknown };
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

  let seed = randomSeed();
  if (body.seed !== undefined) {
    const parsed = parseSeed(body.seed);
    if (parsed === null) {
      return apiError('Seed must be an unsigned 32-bit integer', 'INVALID_SETTING', 400);
    }
    seed = parsed;
  }

  let placements: ShipPlacement[] | undefined;
  if (body.placements !== undefined) {
    const parsed = parsePlacements(body.placements);
    if (!parsed) {
      return apiError('Malformed ship placements', 'INVALID_PLACEMENT', 400);
    }
    placements = parsed;
  }

  const game = await getGame(gameCode);
  if (!game) return gameNotFound();

  if (game.playerId !== playerId) return unauthorized();

  // Must be game_over to restart
  if (game.phase !== 'game_over') return invalidPhase();

  let restarted: BattleshipGameRecord;
  try {
    restarted = restartGame(game, { seed, placements, now: Date.now() });
  } catch (err) {
    return engineError(err, `Restart failed in game ${gameCode}`);
  }

  const updated = await atomicGameUpdate(gameCode, (current) => {
    if (current.phase !== 'game_over') return null;
    return restarted;
  });

  if (!updated) return raceCondition();

  await refreshGameTTL(gameCode);

  return NextResponse.json({ success: true, game: sanitizeForPlayer(updated) });
}
