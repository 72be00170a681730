/**
 * Read-only projection of a GameState for the presentation layer.
 */

import { checkWallCollision } from './snakeEngine'
import type { CellKind, GameState, Snapshot } from './types'

export const GLYPHS: Record<CellKind, string> = {
  'empty': ' ',
  'wall': '█',
  'obstacle': '■',
  'food': '@',
  'snake-body': '○',
  'snake-head': '●',
}

export function buildCells(state: GameState): CellKind[][] {
  const { width, height } = state.level.board
  const cells: CellKind[][] = []
  for (let y = 0; y < height; y++) {
    const row: CellKind[] = []
    for (let x = 0; x < width; x++) {
      row.push(checkWallCollision({ x, y }, state.level.board) ? 'wall' : 'empty')
    }
    cells.push(row)
  }
  for (const { x, y } of state.level.obstacles) cells[y][x] = 'obstacle'
  if (state.food) cells[state.food.y][state.food.x] = 'food'
  // Paint tail to head so the head wins any overlap
  const segments = state.snake.segments
  for (let i = segments.length - 1; i >= 0; i--) {
    const { x, y } = segments[i]
    if (y >= 0 && y < height && x >= 0 && x < width) {
      cells[y][x] = i === 0 ? 'snake-head' : 'snake-body'
    }
  }
  return cells
}

export function toSnapshot(state: GameState, attempt: number): Snapshot {
  return {
    lifecycle: state.lifecycle,
    level: state.level.level,
    levelName: state.level.name,
    levelDescription: state.level.description,
    score: state.score,
    foodEaten: state.foodEaten,
    foodTarget: state.level.foodToAdvance,
    totalFoodEaten: state.totalFoodEaten,
    attempt,
    tickInterval: state.level.tickInterval,
    heading: state.snake.heading,
    snake: state.snake.segments.map(seg => ({ ...seg })),
    food: state.food ? { ...state.food } : null,
    collision: state.collision,
    board: { ...state.level.board },
    cells: buildCells(state),
  }
}

export function renderRows(snapshot: Snapshot): string[] {
  return snapshot.cells.map(row => row.map(cell => GLYPHS[cell]).join(''))
}

export function levelsCompleted(snapshot: Snapshot): number {
  return snapshot.lifecycle === 'victory' ? snapshot.level : snapshot.level - 1
}

export function outcomeMessage(snapshot: Snapshot): string | null {
  if (snapshot.lifecycle === 'victory') return 'You completed all levels!'
  switch (snapshot.collision) {
    case 'self': return 'You bit yourself!'
    case 'wall': return 'You hit the wall!'
    case 'obstacle': return 'You hit an obstacle!'
    case null: return null
  }
}

export function progressText(snapshot: Snapshot): string {
  return `Level ${snapshot.level} - Food: ${snapshot.foodEaten}/${snapshot.foodTarget}`
}
