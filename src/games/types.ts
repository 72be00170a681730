/**
 * Shared types for terminal games.
 */

export type GameStatus = 'idle' | 'playing' | 'paused' | 'won' | 'lost'
