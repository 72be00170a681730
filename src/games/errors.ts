/**
 * Error types raised by game engines.
 *
 * Collisions and other in-game outcomes are never thrown; these cover
 * programmer errors and exhausted boards only.
 */

export class InvalidLevelError extends Error {
  readonly level: number

  constructor(level: number, maxLevel: number) {
    super(`Level ${level} does not exist (expected 1-${maxLevel})`)
    this.name = 'InvalidLevelError'
    this.level = level
  }
}

export class BoardFullError extends Error {
  constructor(width: number, height: number) {
    super(`No free cell left on the ${width}x${height} board`)
    this.name = 'BoardFullError'
  }
}

export class NoActiveGameError extends Error {
  constructor(command: string) {
    super(`Cannot ${command}: no game is active, start one with newGame()`)
    this.name = 'NoActiveGameError'
  }
}
