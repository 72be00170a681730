/**
 * Pull-based intent source: key presses are pushed as they arrive and the
 * game loop pulls one per tick.
 */

import type { Direction, Intent } from './types'

export interface IntentSource {
  next(): Intent
}

export interface IntentBuffer extends IntentSource {
  push(direction: Direction): void
  clear(): void
  readonly size: number
}

export const INTENT_CAPACITY = 3

export function createIntentBuffer(capacity = INTENT_CAPACITY): IntentBuffer {
  const queue: Direction[] = []

  return {
    push(direction) {
      if (queue.length >= capacity) return
      if (queue[queue.length - 1] === direction) return
      queue.push(direction)
    },
    next() {
      return queue.shift() ?? 'NONE'
    },
    clear() {
      queue.length = 0
    },
    get size() {
      return queue.length
    },
  }
}
