import { Redis } from '@upstash/redis';
import type { BattleshipGameRecord } from './games/battleship';
import { GAME_TTL_SECONDS } from './constants';

// --- Env-var validation ---

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

// --- Client ---

export const redis = new Redis({
  url: requireEnv('KV_REST_API_URL'),
  token: requireEnv('KV_REST_API_TOKEN'),
});

// --- Key helpers ---

function gameKey(gameCode: string): string {
  return `game:${gameCode}`;
}

// Upstash auto-parses JSON, so a stored value may come back as an object
function parseRecord(data: unknown): BattleshipGameRecord | null {
  if (!data) return null;
  if (typeof data === 'string') return JSON.parse(data) as BattleshipGameRecord;
  return data as BattleshipGameRecord;
}

// --- Game CRUD ---

export async function createGame(game: BattleshipGameRecord): Promise<void> {
  await redis.set(gameKey(game.gameCode), JSON.stringify(game), {
    ex: GAME_TTL_SECONDS,
  });
}

export async function getGame(gameCode: string): Promise<BattleshipGameRecord | null> {
  const data = await redis.get<unknown>(gameKey(gameCode));
  return parseRecord(data);
}

export async function deleteGame(gameCode: string): Promise<void> {
  await redis.del(gameKey(gameCode));
}

export async function refreshGameTTL(gameCode: string): Promise<void> {
  await redis.expire(gameKey(gameCode), GAME_TTL_SECONDS);
}

/**
 * Check if a game code already exists in Redis.
 */
export async function gameExists(gameCode: string): Promise<boolean> {
  const exists = await redis.exists(gameKey(gameCode));
  return exists === 1;
}

/**
 * Atomically update a game. The `updater` receives the current record and
 * returns the new one, or null to abort. Returns null if the game is missing,
 * the updater aborted, or another request wrote in between.
 */
export async function atomicGameUpdate(
  gameCode: string,
  updater: (game: BattleshipGameRecord) => BattleshipGameRecord | null
): Promise<BattleshipGameRecord | null> {
  // Upstash REST API doesn't support WATCH/MULTI, so we read, apply the update
  // client-side, then let a Lua script write only if the value is unchanged.

  const key = gameKey(gameCode);
  const current = parseRecord(await redis.get<unknown>(key));
  if (!current) return null;

  const updated = updater(current);
  if (!updated) return null;

  const currentSerialized = JSON.stringify(current);
  const updatedSerialized = JSON.stringify(updated);

  const script = `
    local current = redis.call('GET', KEYS[1])
    if current == ARGV[1] then
      redis.call('SET', KEYS[1], ARGV[2], 'EX', ARGV[3])
      return 1
    else
      return 0
    end
  `;

  const result = await redis.eval(
    script,
    [key],
    [currentSerialized, updatedSerialized, GAME_TTL_SECONDS.toString()]
  );

  if (result === 1) {
    return updated;
  }

  // CAS failed: another request mutated the game between our read and write
  return null;
}
