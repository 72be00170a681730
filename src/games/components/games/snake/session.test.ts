/**
 * Tests for the Snake session controller.
 */

import { describe, test, expect } from 'vitest'
import { NoActiveGameError } from '../../../errors'
import { FOOD_REWARD } from './gameMachine'
import { LevelCatalog, buildStandardLevels } from './levels'
import { mulberry32 } from './random'
import { SnakeSession } from './session'
import { makeCatalog } from './testLevels'
import type { Intent } from './types'

function testSession() {
  return new SnakeSession({ catalog: makeCatalog({}, {}), random: () => 0 })
}

describe('SnakeSession lifecycle', () => {
  test('commands before newGame throw NoActiveGameError', () => {
    const session = testSession()
    expect(session.isActive).toBe(false)
    expect(() => session.tick('UP')).toThrow(NoActiveGameError)
    expect(() => session.pause()).toThrow(NoActiveGameError)
    expect(() => session.resume()).toThrow(NoActiveGameError)
    expect(() => session.current()).toThrow(NoActiveGameError)
  })

  test('newGame starts at level 1 with no score', () => {
    const snapshot = testSession().newGame()
    expect(snapshot.lifecycle).toBe('running')
    expect(snapshot.level).toBe(1)
    expect(snapshot.score).toBe(0)
    expect(snapshot.attempt).toBe(1)
    expect(snapshot.snake).toHaveLength(3)
  })

  test('pause and resume toggle the lifecycle', () => {
    const session = testSession()
    session.newGame()
    const paused = session.pause()
    expect(paused.lifecycle).toBe('paused')
    expect(session.pause()).toBe(paused)
    expect(session.tick('UP')).toBe(paused)

    const resumed = session.resume()
    expect(resumed.lifecycle).toBe('running')
    expect(session.resume()).toBe(resumed)
  })

  test('quit discards the game and newGame starts a fresh one', () => {
    const session = testSession()
    session.newGame()
    session.tick('UP')
    session.quit()

    expect(session.isActive).toBe(false)
    expect(() => session.tick('UP')).toThrow(NoActiveGameError)

    const fresh = session.newGame()
    expect(fresh.attempt).toBe(2)
    expect(fresh.snake[0]).toEqual({ x: 3, y: 3 })
  })

  test('uses the standard catalog by default', () => {
    const session = new SnakeSession()
    expect(session.catalog.maxLevel).toBe(10)
    const snapshot = session.newGame()
    expect(snapshot.board).toEqual({ width: 30, height: 15 })
    expect(snapshot.levelName).toBe('Open Field')
  })
})

describe('SnakeSession ticks', () => {
  test('steering onto the food scores and grows the snake', () => {
    const session = testSession()
    const start = session.newGame()
    expect(start.food).toEqual({ x: 1, y: 1 })

    session.tick('UP')
    session.tick('UP')
    session.tick('LEFT')
    const fed = session.tick('LEFT')

    expect(fed.score).toBe(FOOD_REWARD)
    expect(fed.snake).toEqual([{ x: 1, y: 1 }, { x: 2, y: 1 }, { x: 3, y: 1 }, { x: 3, y: 2 }])
    expect(fed.food).toEqual({ x: 4, y: 1 })
    expect(fed.foodEaten).toBe(1)
  })

  test('reversal ticks return the same snapshot', () => {
    const session = testSession()
    const start = session.newGame()
    expect(session.tick('LEFT')).toBe(start)
    expect(session.tick('LEFT')).toBe(start)
    expect(session.tick('LEFT')).toBe(start)
  })

  test('game over freezes all later ticks', () => {
    const session = testSession()
    session.newGame()
    session.tick('RIGHT')
    session.tick('RIGHT')
    const over = session.tick('RIGHT')

    expect(over.lifecycle).toBe('game-over')
    expect(over.collision).toBe('wall')
    expect(over.score).toBe(0)
    expect(session.tick('UP')).toBe(over)
    expect(session.pause()).toBe(over)
    expect(session.resume()).toBe(over)
  })

  test('newGame after game over resets the score and counts the attempt', () => {
    const session = testSession()
    session.newGame()
    session.tick('RIGHT')
    session.tick('RIGHT')
    session.tick('RIGHT')

    const again = session.newGame()
    expect(again.lifecycle).toBe('running')
    expect(again.score).toBe(0)
    expect(again.attempt).toBe(2)
    expect(session.attempt).toBe(2)
  })

  test('score never decreases over a long random game', () => {
    const rand = mulberry32(2024)
    const session = new SnakeSession({
      catalog: new LevelCatalog(buildStandardLevels({ width: 20, height: 12 })),
      random: mulberry32(7),
    })
    const intents: Intent[] = ['UP', 'DOWN', 'LEFT', 'RIGHT', 'NONE', 'NONE']

    let snapshot = session.newGame()
    for (let i = 0; i < 2000; i++) {
      const intent = intents[Math.floor(rand() * intents.length)]
      const next = session.tick(intent)
      if (next.lifecycle === 'game-over' || next.lifecycle === 'victory') {
        expect(session.tick('NONE')).toBe(next)
        snapshot = session.newGame()
        expect(snapshot.score).toBe(0)
        continue
      }
      expect(next.score).toBeGreaterThanOrEqual(snapshot.score)
      expect(next.snake.length).toBeGreaterThanOrEqual(3)
      snapshot = next
    }
  })
})
