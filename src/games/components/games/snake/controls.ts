/**
 * Keyboard mapping for the Snake screen.
 */

import type { Key } from 'ink'
import type { Direction } from './types'

export type Command =
  | { type: 'steer'; direction: Direction }
  | { type: 'toggle-pause' }
  | { type: 'quit' }
  | { type: 'play-again' }
  | { type: 'decline' }
  | { type: 'instructions' }
  | { type: 'none' }

export type ControlKey = Pick<Key, 'upArrow' | 'downArrow' | 'leftArrow' | 'rightArrow' | 'escape'>

const LETTER_DIRECTIONS: Record<string, Direction> = {
  w: 'UP', s: 'DOWN', a: 'LEFT', d: 'RIGHT',
}

export function mapKey(input: string, key: ControlKey): Command {
  if (key.upArrow) return { type: 'steer', direction: 'UP' }
  if (key.downArrow) return { type: 'steer', direction: 'DOWN' }
  if (key.leftArrow) return { type: 'steer', direction: 'LEFT' }
  if (key.rightArrow) return { type: 'steer', direction: 'RIGHT' }
  if (key.escape) return { type: 'quit' }

  const letter = input.toLowerCase()
  const direction = LETTER_DIRECTIONS[letter]
  if (direction) return { type: 'steer', direction }
  switch (letter) {
    case 'p':
    case ' ':
      return { type: 'toggle-pause' }
    case 'q':
      return { type: 'quit' }
    case 'y':
      return { type: 'play-again' }
    case 'n':
      return { type: 'decline' }
    case 'i':
      return { type: 'instructions' }
    default:
      return { type: 'none' }
  }
}
