/**
 * Tests for the snapshot projection and its text helpers.
 */

import { describe, test, expect } from 'vitest'
import { startLevel } from './gameMachine'
import { levelsCompleted, outcomeMessage, progressText, renderRows, toSnapshot } from './snapshot'
import { makeCatalog } from './testLevels'
import type { Snapshot } from './types'

function snapshotFor(...overrides: Parameters<typeof makeCatalog>): Snapshot {
  const state = startLevel({ catalog: makeCatalog(...overrides), random: () => 0 }, 1)
  return toSnapshot(state, 1)
}

describe('toSnapshot', () => {
  const snapshot = snapshotFor({})

  test('copies the game summary', () => {
    expect(snapshot.lifecycle).toBe('running')
    expect(snapshot.level).toBe(1)
    expect(snapshot.levelName).toBe('Test 1')
    expect(snapshot.score).toBe(0)
    expect(snapshot.foodEaten).toBe(0)
    expect(snapshot.foodTarget).toBe(5)
    expect(snapshot.attempt).toBe(1)
    expect(snapshot.tickInterval).toBe(0.4)
    expect(snapshot.heading).toBe('RIGHT')
    expect(snapshot.food).toEqual({ x: 1, y: 1 })
    expect(snapshot.board).toEqual({ width: 7, height: 7 })
  })

  test('builds the full cell grid', () => {
    expect(snapshot.cells).toHaveLength(7)
    expect(snapshot.cells[0][0]).toBe('wall')
    expect(snapshot.cells[1][1]).toBe('food')
    expect(snapshot.cells[3][3]).toBe('snake-head')
    expect(snapshot.cells[3][1]).toBe('snake-body')
    expect(snapshot.cells[4][4]).toBe('empty')
  })
})

describe('renderRows', () => {
  test('draws walls, food and the snake', () => {
    expect(renderRows(snapshotFor({}))).toEqual([
      '███████',
      '█@    █',
      '█     █',
      '█○○●  █',
      '█     █',
      '█     █',
      '███████',
    ])
  })

  test('draws obstacles', () => {
    const rows = renderRows(snapshotFor({ obstacles: [{ x: 3, y: 1 }] }))
    expect(rows[1]).toBe('█@ ■  █')
  })
})

describe('text helpers', () => {
  const base = snapshotFor({})

  test('progressText shows the food count for the level', () => {
    expect(progressText(base)).toBe('Level 1 - Food: 0/5')
  })

  test('outcomeMessage describes the collision', () => {
    expect(outcomeMessage({ ...base, lifecycle: 'game-over', collision: 'self' })).toBe('You bit yourself!')
    expect(outcomeMessage({ ...base, lifecycle: 'game-over', collision: 'wall' })).toBe('You hit the wall!')
    expect(outcomeMessage({ ...base, lifecycle: 'game-over', collision: 'obstacle' })).toBe('You hit an obstacle!')
  })

  test('outcomeMessage celebrates a victory', () => {
    expect(outcomeMessage({ ...base, lifecycle: 'victory' })).toBe('You completed all levels!')
  })

  test('outcomeMessage is null while playing', () => {
    expect(outcomeMessage(base)).toBeNull()
  })

  test('levelsCompleted counts the final level only on victory', () => {
    expect(levelsCompleted({ ...base, level: 3, lifecycle: 'game-over' })).toBe(2)
    expect(levelsCompleted({ ...base, level: 10, lifecycle: 'victory' })).toBe(10)
  })
})
