import { GAME_CODE_CHARS, GAME_CODE_LENGTH } from './constants';

export function generateGameCode(): string {
  let code = '';
  for (let i = 0; i < GAME_CODE_LENGTH; i++) {
    code += GAME_CODE_CHARS[Math.floor(Math.random() * GAME_CODE_CHARS.length)];
  }
  return code;
}

export function generatePlayerId(): string {
  return crypto.randomUUID();
}

/** Seeds are uint32; anything else is rejected. */
export function parseSeed(value: unknown): number | null {
  if (typeof value !== 'number' || !Number.isInteger(value)) return null;
  if (value < 0 || value > 0xFFFFFFFF) return null;
  return value;
}
