/**
 * Snake model: pure functions over an immutable body, no React dependencies.
 */

import type { Board, Direction, Position, SnakeBody, Spawn } from './types'

const OPPOSITES: Record<Direction, Direction> = {
  UP: 'DOWN',
  DOWN: 'UP',
  LEFT: 'RIGHT',
  RIGHT: 'LEFT',
}

export function positionKey(pos: Position): string {
  return `${pos.x},${pos.y}`
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y
}

export function getNextHead(head: Position, direction: Direction): Position {
  switch (direction) {
    case 'UP': return { x: head.x, y: head.y - 1 }
    case 'DOWN': return { x: head.x, y: head.y + 1 }
    case 'LEFT': return { x: head.x - 1, y: head.y }
    case 'RIGHT': return { x: head.x + 1, y: head.y }
  }
}

export function isOppositeDirection(current: Direction, next: Direction): boolean {
  return OPPOSITES[current] === next
}

export function headOf(snake: SnakeBody): Position {
  return snake.segments[0]
}

/** Body laid out behind the spawn head, opposite to the heading. */
export function spawnSnake(spawn: Spawn): SnakeBody {
  const behind = OPPOSITES[spawn.heading]
  const segments: Position[] = [{ ...spawn.head }]
  for (let i = 1; i < spawn.length; i++) {
    segments.push(getNextHead(segments[i - 1], behind))
  }
  return { segments, heading: spawn.heading, pendingGrowth: 0 }
}

/** Returns the same snake when the turn would reverse it. */
export function steer(snake: SnakeBody, direction: Direction): SnakeBody {
  if (direction === snake.heading || isOppositeDirection(snake.heading, direction)) return snake
  return { ...snake, heading: direction }
}

export function grow(snake: SnakeBody): SnakeBody {
  return { ...snake, pendingGrowth: snake.pendingGrowth + 1 }
}

export function moveSnake(snake: readonly Position[], direction: Direction, growing: boolean): Position[] {
  const newHead = getNextHead(snake[0], direction)
  const newSnake = [newHead, ...snake]
  if (!growing) newSnake.pop()
  return newSnake
}

export function advance(snake: SnakeBody): SnakeBody {
  const growing = snake.pendingGrowth > 0
  return {
    segments: moveSnake(snake.segments, snake.heading, growing),
    heading: snake.heading,
    pendingGrowth: growing ? snake.pendingGrowth - 1 : 0,
  }
}

export function collidesWithSelf(snake: SnakeBody, cell: Position): boolean {
  // The tail moves out of the way this tick unless it is being kept
  const body = snake.pendingGrowth > 0 ? snake.segments : snake.segments.slice(0, -1)
  return body.some(seg => samePosition(seg, cell))
}

/** Walls are the outer ring of the board. */
export function checkWallCollision(pos: Position, board: Board): boolean {
  return pos.x <= 0 || pos.x >= board.width - 1 || pos.y <= 0 || pos.y >= board.height - 1
}
