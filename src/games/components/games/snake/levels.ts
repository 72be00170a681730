/**
 * Level catalog: ten hand-authored layouts that get faster and more
 * crowded as the level number rises.
 *
 * Layouts are generated from the board size, then cleared of the wall
 * ring, the spawn body and the lane ahead of the spawn head.
 */

import { InvalidLevelError } from '../../../errors'
import { mulberry32, randInt } from './random'
import { getNextHead, positionKey, spawnSnake, checkWallCollision } from './snakeEngine'
import type { Board, LevelDefinition, Position, Spawn } from './types'

export const MIN_BOARD: Board = { width: 20, height: 12 }
export const FOOD_TO_ADVANCE = 5
export const SPAWN_LENGTH = 3

interface LevelTemplate {
  name: string
  description: string
  tickInterval: number
  layout: (board: Board) => Position[]
}

/** Half-open integer range, like a for loop with `<`. */
function range(start: number, end: number, step = 1): number[] {
  const values: number[] = []
  for (let i = start; i < end; i += step) values.push(i)
  return values
}

function centre(board: Board): Position {
  return { x: Math.floor(board.width / 2), y: Math.floor(board.height / 2) }
}

function scatter(seed: number, count: number, min: Position, max: Position): Position[] {
  const rand = mulberry32(seed)
  const cells: Position[] = []
  for (let i = 0; i < count; i++) {
    cells.push({ x: randInt(rand, min.x, max.x), y: randInt(rand, min.y, max.y) })
  }
  return cells
}

const LEVEL_TEMPLATES: LevelTemplate[] = [
  {
    name: 'Open Field',
    description: 'Learn the basics',
    tickInterval: 0.4,
    layout: () => [],
  },
  {
    name: 'Cross Roads',
    description: 'Navigate around obstacles',
    tickInterval: 0.35,
    layout: board => {
      const mid = centre(board)
      return [
        ...range(mid.y - 2, mid.y + 3).map(y => ({ x: mid.x, y })),
        ...range(mid.x - 3, mid.x + 4).map(x => ({ x, y: mid.y })),
      ]
    },
  },
  {
    name: 'Corner Blocks',
    description: 'Use the corners wisely',
    tickInterval: 0.3,
    layout: ({ width, height }) => [
      ...range(3, 8).flatMap(x => range(3, 6).map(y => ({ x, y }))),
      ...range(width - 8, width - 3).flatMap(x => range(height - 6, height - 3).map(y => ({ x, y }))),
    ],
  },
  {
    name: 'Corridors',
    description: 'Find your path through',
    tickInterval: 0.25,
    layout: ({ width, height }) =>
      range(4, height - 4)
        .filter(y => y % 4 === 0)
        .flatMap(y => [
          ...range(4, width - 10).map(x => ({ x, y })),
          ...range(width - 6, width - 4).map(x => ({ x, y })),
        ]),
  },
  {
    name: 'Spiral Challenge',
    description: 'Navigate the spiral',
    tickInterval: 0.2,
    layout: board => {
      const mid = centre(board)
      return range(1, 4).flatMap(r =>
        range(0, 360, 30).map(angle => {
          const radians = (angle * Math.PI) / 180
          return {
            x: mid.x + Math.trunc(r * Math.cos(radians)),
            y: mid.y + Math.trunc(r * Math.sin(radians)),
          }
        }),
      )
    },
  },
  {
    name: 'Border Patrol',
    description: 'Avoid the border obstacles',
    tickInterval: 0.18,
    layout: ({ width, height }) => [
      ...range(3, width - 3).flatMap(x => [{ x, y: 3 }, { x, y: height - 4 }]),
      ...range(3, height - 3).flatMap(y => [{ x: 3, y }, { x: width - 4, y }]),
    ],
  },
  {
    name: 'Scattered Chaos',
    description: 'Random obstacles everywhere',
    tickInterval: 0.15,
    layout: ({ width, height }) =>
      scatter(
        42,
        Math.min(20, Math.floor((width * height) / 20)),
        { x: 4, y: 4 },
        { x: width - 5, y: height - 5 },
      ),
  },
  {
    name: 'Diamond Mine',
    description: 'Navigate the diamond pattern',
    tickInterval: 0.12,
    layout: board => {
      const mid = centre(board)
      const size = Math.floor(Math.min(board.width, board.height) / 4)
      return range(mid.x - size, mid.x + size + 1).flatMap(x =>
        range(mid.y - size, mid.y + size + 1)
          .filter(y => Math.abs(x - mid.x) + Math.abs(y - mid.y) === size)
          .map(y => ({ x, y })),
      )
    },
  },
  {
    name: 'Complex Maze',
    description: 'Advanced navigation required',
    tickInterval: 0.1,
    layout: ({ width, height }) => [
      ...range(5, width - 5, 3).flatMap(x =>
        range(2, height - 2).filter(y => y % 4 !== 0).map(y => ({ x, y })),
      ),
      ...range(5, height - 5, 3).flatMap(y =>
        range(2, width - 2).filter(x => x % 4 !== 0).map(x => ({ x, y })),
      ),
    ],
  },
  {
    name: 'Master Challenge',
    description: 'Ultimate test of skill',
    tickInterval: 0.08,
    layout: board => {
      const mid = centre(board)
      const cross = range(-2, 3).flatMap(i => [
        { x: mid.x + i, y: mid.y },
        { x: mid.x, y: mid.y + i },
      ])
      const count = Math.min(40, Math.floor((board.width * board.height) / 15))
      return [
        ...cross,
        ...scatter(10, count, { x: 3, y: 3 }, { x: board.width - 4, y: board.height - 4 }),
      ]
    },
  },
]

export function standardSpawn(board: Board): Spawn {
  return { head: centre(board), heading: 'RIGHT', length: SPAWN_LENGTH }
}

/** Cells ahead of the spawn head, up to the wall. */
export function spawnLane(spawn: Spawn, board: Board): Position[] {
  const lane: Position[] = []
  let cell = getNextHead(spawn.head, spawn.heading)
  while (!checkWallCollision(cell, board)) {
    lane.push(cell)
    cell = getNextHead(cell, spawn.heading)
  }
  return lane
}

/** Cells a layout must leave free: the spawn body and its heading lane. */
export function reservedCells(spawn: Spawn, board: Board): Position[] {
  return [...spawnSnake(spawn).segments, ...spawnLane(spawn, board)]
}

function clearLayout(cells: Position[], board: Board, spawn: Spawn): Position[] {
  const blocked = new Set(reservedCells(spawn, board).map(positionKey))
  const seen = new Set<string>()
  return cells.filter(cell => {
    const key = positionKey(cell)
    if (seen.has(key) || blocked.has(key) || checkWallCollision(cell, board)) return false
    seen.add(key)
    return true
  })
}

export function buildStandardLevels(board: Board): LevelDefinition[] {
  if (
    !Number.isInteger(board.width) || !Number.isInteger(board.height) ||
    board.width < MIN_BOARD.width || board.height < MIN_BOARD.height
  ) {
    throw new RangeError(
      `Board must be at least ${MIN_BOARD.width}x${MIN_BOARD.height}, got ${board.width}x${board.height}`,
    )
  }
  const spawn = standardSpawn(board)
  return LEVEL_TEMPLATES.map((template, index) => ({
    level: index + 1,
    name: template.name,
    description: template.description,
    board: { ...board },
    obstacles: clearLayout(template.layout(board), board, spawn),
    spawn,
    tickInterval: template.tickInterval,
    foodToAdvance: FOOD_TO_ADVANCE,
  }))
}

function outsidePlayfield(cell: Position, board: Board): boolean {
  return !Number.isInteger(cell.x) || !Number.isInteger(cell.y) || checkWallCollision(cell, board)
}

function validateLayout(def: LevelDefinition) {
  const body = spawnSnake(def.spawn).segments
  for (const { x, y } of body) {
    if (outsidePlayfield({ x, y }, def.board)) {
      throw new RangeError(`Level ${def.level} spawns the snake outside the playfield at (${x},${y})`)
    }
  }
  const spawnCells = new Set(body.map(positionKey))
  for (const { x, y } of def.obstacles) {
    if (outsidePlayfield({ x, y }, def.board)) {
      throw new RangeError(`Level ${def.level} has an obstacle outside the playfield at (${x},${y})`)
    }
    if (spawnCells.has(positionKey({ x, y }))) {
      throw new RangeError(`Level ${def.level} has an obstacle on the spawn at (${x},${y})`)
    }
  }
}

export class LevelCatalog {
  private readonly levels: readonly LevelDefinition[]

  constructor(levels: readonly LevelDefinition[]) {
    if (levels.length === 0) throw new RangeError('A level catalog needs at least one level')
    levels.forEach((def, index) => {
      if (def.level !== index + 1) {
        throw new RangeError(`Level at position ${index + 1} is numbered ${def.level}`)
      }
      validateLayout(def)
    })
    this.levels = levels.map(def => Object.freeze({ ...def, obstacles: Object.freeze([...def.obstacles]) }))
  }

  get maxLevel(): number {
    return this.levels.length
  }

  getLevel(level: number): LevelDefinition {
    if (!Number.isInteger(level) || level < 1 || level > this.levels.length) {
      throw new InvalidLevelError(level, this.levels.length)
    }
    return this.levels[level - 1]
  }

  isFinalLevel(level: number): boolean {
    return level >= this.levels.length
  }

  getLevels(): readonly LevelDefinition[] {
    return this.levels
  }
}
