import { NextResponse } from 'next/server';
import { createGame, gameExists } from '@/lib/redis';
import { generateGameCode, generatePlayerId, parseSeed } from '@/lib/utils';
import { apiError, engineError } from '@/lib/errors';
import { randomSeed } from '@/lib/random';
import { GAME_CODE_MAX_ATTEMPTS } from '@/lib/constants';
import {
  DEFAULT_DIFFICULTY,
  DEFAULT_PRESET,
  initializeGame,
  isDifficulty,
  isPresetName,
  parsePlacements,
  sanitizeForPlayer,
} from '@/lib/games/battleship';
import type { BattleshipGameRecord, ShipPlacement } from '@/lib/games/battleship';

export async function POST(request: Request) {
  let body: { preset?: unknown; difficulty?: unknown; seed?: unknown; placements?: unknown };
  try {
    body = (await request.json()) ?? {};
  } catch {
    return apiError('Invalid request body', 'INVALID_REQUEST', 400);
  }

  const preset = body.preset ?? DEFAULT_PRESET;
  if (!isPresetName(preset)) {
    return apiError('Unknown board preset', 'INVALID_SETTING', 400);
  }

  const difficulty = body.difficulty ?? DEFAULT_DIFFICULTY;
  if (!isDifficulty(difficulty)) {
    return apiError('Unknown difficulty', 'INVALID_SETTING', 400);
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

  // Generate collision-checked game code
  let gameCode = generateGameCode();
  let attempts = 0;
  while (await gameExists(gameCode)) {
    gameCode = generateGameCode();
    attempts++;
    if (attempts > GAME_CODE_MAX_ATTEMPTS) {
      return apiError('Could not generate game code', 'INTERNAL_ERROR', 500);
    }
  }

  const playerId = generatePlayerId();

  let game: BattleshipGameRecord;
  try {
    game = initializeGame({
      gameCode,
      playerId,
      preset,
      difficulty,
      seed,
      placements,
      now: Date.now(),
    });
  } catch (err) {
    return engineError(err, 'Game setup failed');
  }

  await createGame(game);

  return NextResponse.json({ gameCode, playerId, game: sanitizeForPlayer(game) });
}
