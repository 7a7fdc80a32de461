// --- Session store ---

export const GAME_TTL_SECONDS = 7200; // 2 hours

// --- Game codes ---

export const GAME_CODE_CHARS = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789'; // Removed ambiguous: 0/O, 1/I
export const GAME_CODE_LENGTH = 6;
export const GAME_CODE_MAX_ATTEMPTS = 10;
