// --- API Errors ---

export interface ApiError {
  error: string;    // Human-readable message
  code: string;     // Machine-readable code
}

// Standard codes: GAME_NOT_FOUND, UNAUTHORIZED, INVALID_PHASE, RACE_CONDITION,
// INVALID_REQUEST, INVALID_SETTING, INTERNAL_ERROR
// Battleship engine codes: INVALID_PLACEMENT, OUT_OF_BOUNDS, ALREADY_FIRED
