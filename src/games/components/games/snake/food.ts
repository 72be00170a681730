/**
 * Food placement: a uniform pick among the free interior cells.
 */

import { BoardFullError } from '../../../errors'
import { positionKey } from './snakeEngine'
import type { Board, Position } from './types'

/** Free interior cells in row-major order. */
export function eligibleCells(
  board: Board,
  snakeCells: readonly Position[],
  obstacleCells: readonly Position[],
): Position[] {
  const occupied = new Set([...snakeCells, ...obstacleCells].map(positionKey))
  const cells: Position[] = []
  for (let y = 1; y < board.height - 1; y++) {
    for (let x = 1; x < board.width - 1; x++) {
      if (!occupied.has(`${x},${y}`)) cells.push({ x, y })
    }
  }
  return cells
}

export function placeFood(
  board: Board,
  snakeCells: readonly Position[],
  obstacleCells: readonly Position[],
  random: () => number = Math.random,
): Position {
  const cells = eligibleCells(board, snakeCells, obstacleCells)
  if (cells.length === 0) throw new BoardFullError(board.width, board.height)
  const index = Math.min(cells.length - 1, Math.floor(random() * cells.length))
  return cells[index]
}
