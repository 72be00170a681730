/**
 * Small hand-made levels for tests: a 5x5 playfield inside a 7x7 grid,
 * snake spawning at the centre heading right with length 3.
 */

import { LevelCatalog } from './levels'
import type { LevelDefinition } from './types'

export function makeLevel(level: number, overrides: Partial<LevelDefinition> = {}): LevelDefinition {
  return {
    level,
    name: `Test ${level}`,
    description: 'test',
    board: { width: 7, height: 7 },
    obstacles: [],
    spawn: { head: { x: 3, y: 3 }, heading: 'RIGHT', length: 3 },
    tickInterval: 0.4,
    foodToAdvance: 5,
    ...overrides,
  }
}

export function makeCatalog(...overrides: Partial<LevelDefinition>[]): LevelCatalog {
  return new LevelCatalog(overrides.map((o, i) => makeLevel(i + 1, o)))
}
