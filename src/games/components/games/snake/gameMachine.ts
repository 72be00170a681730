/**
 * Snake game state machine.
 *
 * Every transition takes a GameState and returns the next one without
 * mutating its input. Returning the very same object means nothing changed.
 *
 *   running ⇄ paused
 *   running → level-complete → running (next level)
 *   running → game-over
 *   level-complete (final level) → victory
 */

import { BoardFullError } from '../../../errors'
import { placeFood } from './food'
import type { LevelCatalog } from './levels'
import {
  advance, checkWallCollision, collidesWithSelf, getNextHead, grow, headOf,
  isOppositeDirection, positionKey, samePosition, spawnSnake, steer,
} from './snakeEngine'
import type { CollisionKind, GameState, Intent, Position } from './types'

export const FOOD_REWARD = 10
export const LEVEL_BONUS = 50

export interface MachineContext {
  catalog: LevelCatalog
  random: () => number
}

interface Carry {
  score: number
  totalFoodEaten: number
}

export type CellClass = CollisionKind | 'food' | 'empty'

function withFreshFood(state: GameState, random: () => number): GameState {
  try {
    const food = placeFood(state.level.board, state.snake.segments, state.level.obstacles, random)
    return { ...state, food }
  } catch (error) {
    // A snake that fills the board has nothing left to eat: that is a win
    if (error instanceof BoardFullError) return { ...state, food: null, lifecycle: 'victory' }
    throw error
  }
}

export function startLevel(
  context: MachineContext,
  levelNumber: number,
  carry: Carry = { score: 0, totalFoodEaten: 0 },
): GameState {
  const level = context.catalog.getLevel(levelNumber)
  return withFreshFood({
    level,
    score: carry.score,
    snake: spawnSnake(level.spawn),
    food: null,
    foodEaten: 0,
    totalFoodEaten: carry.totalFoodEaten,
    lifecycle: 'running',
    collision: null,
  }, context.random)
}

export function classifyCell(state: GameState, cell: Position): CellClass {
  if (checkWallCollision(cell, state.level.board)) return 'wall'
  const key = positionKey(cell)
  if (state.level.obstacles.some(obstacle => positionKey(obstacle) === key)) return 'obstacle'
  if (collidesWithSelf(state.snake, cell)) return 'self'
  if (state.food && samePosition(state.food, cell)) return 'food'
  return 'empty'
}

export function completeLevel(state: GameState, context: MachineContext): GameState {
  const completed: GameState = { ...state, score: state.score + LEVEL_BONUS, lifecycle: 'level-complete' }
  if (context.catalog.isFinalLevel(completed.level.level)) {
    return { ...completed, food: null, lifecycle: 'victory' }
  }
  return startLevel(context, completed.level.level + 1, {
    score: completed.score,
    totalFoodEaten: completed.totalFoodEaten,
  })
}

export function tickGame(state: GameState, intent: Intent, context: MachineContext): GameState {
  if (state.lifecycle !== 'running') return state
  // Reversal is ignored outright: no turn and no step this tick
  if (intent !== 'NONE' && isOppositeDirection(state.snake.heading, intent)) return state

  const snake = intent === 'NONE' ? state.snake : steer(state.snake, intent)
  const candidate = getNextHead(headOf(snake), snake.heading)
  const kind = classifyCell({ ...state, snake }, candidate)

  switch (kind) {
    case 'wall':
    case 'obstacle':
    case 'self':
      return { ...state, lifecycle: 'game-over', collision: kind }
    case 'food': {
      const fed: GameState = {
        ...state,
        snake: advance(grow(snake)),
        score: state.score + FOOD_REWARD,
        foodEaten: state.foodEaten + 1,
        totalFoodEaten: state.totalFoodEaten + 1,
      }
      if (fed.foodEaten >= fed.level.foodToAdvance) return completeLevel(fed, context)
      return withFreshFood(fed, context.random)
    }
    case 'empty':
      return { ...state, snake: advance(snake) }
  }
}

export function pauseGame(state: GameState): GameState {
  return state.lifecycle === 'running' ? { ...state, lifecycle: 'paused' } : state
}

export function resumeGame(state: GameState): GameState {
  return state.lifecycle === 'paused' ? { ...state, lifecycle: 'running' } : state
}

export function isFinished(state: { lifecycle: GameState['lifecycle'] }): boolean {
  return state.lifecycle === 'game-over' || state.lifecycle === 'victory'
}
