/**
 * Game Configuration
 *
 * Board size comes from environment variables, falling back to defaults
 * when a value is missing or out of range.
 */

import type { Board } from './games/components/games/snake/types'

export interface GameConfig {
  board: Board
}

export const DEFAULT_CONFIG: GameConfig = {
  board: { width: 30, height: 15 },
}

export const BOARD_LIMITS = {
  width: { min: 20, max: 80 },
  height: { min: 12, max: 40 },
} as const

type Env = Record<string, string | undefined>

function readDimension(env: Env, name: string, fallback: number, limits: { min: number; max: number }): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < limits.min || value > limits.max) {
    console.warn(`Ignoring ${name}=${raw}: expected an integer from ${limits.min} to ${limits.max}, using ${fallback}`)
    return fallback
  }
  return value
}

export function loadConfig(env: Env = process.env): GameConfig {
  return {
    board: {
      width: readDimension(env, 'SNAKE_BOARD_WIDTH', DEFAULT_CONFIG.board.width, BOARD_LIMITS.width),
      height: readDimension(env, 'SNAKE_BOARD_HEIGHT', DEFAULT_CONFIG.board.height, BOARD_LIMITS.height),
    },
  }
}
