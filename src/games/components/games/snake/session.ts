/**
 * Session controller: owns the one GameState of a play session and is the
 * only thing that replaces it.
 */

import { DEFAULT_CONFIG } from '../../../../config'
import { NoActiveGameError } from '../../../errors'
import { pauseGame, resumeGame, startLevel, tickGame, type MachineContext } from './gameMachine'
import { LevelCatalog, buildStandardLevels } from './levels'
import { toSnapshot } from './snapshot'
import type { GameState, Intent, Snapshot } from './types'

export interface SessionOptions {
  catalog?: LevelCatalog
  random?: () => number
}

interface ActiveGame {
  state: GameState
  snapshot: Snapshot
}

export class SnakeSession {
  private readonly context: MachineContext
  private game: ActiveGame | null = null
  private attempts = 0

  constructor(options: SessionOptions = {}) {
    this.context = {
      catalog: options.catalog ?? new LevelCatalog(buildStandardLevels(DEFAULT_CONFIG.board)),
      random: options.random ?? Math.random,
    }
  }

  get catalog(): LevelCatalog {
    return this.context.catalog
  }

  /** Number of games started in this session. */
  get attempt(): number {
    return this.attempts
  }

  get isActive(): boolean {
    return this.game !== null
  }

  current(): Snapshot {
    return this.require('read the game').snapshot
  }

  newGame(): Snapshot {
    this.attempts += 1
    const state = startLevel(this.context, 1)
    this.game = { state, snapshot: toSnapshot(state, this.attempts) }
    return this.game.snapshot
  }

  tick(intent: Intent = 'NONE'): Snapshot {
    const game = this.require('tick')
    return this.commit(game, tickGame(game.state, intent, this.context))
  }

  pause(): Snapshot {
    const game = this.require('pause')
    return this.commit(game, pauseGame(game.state))
  }

  resume(): Snapshot {
    const game = this.require('resume')
    return this.commit(game, resumeGame(game.state))
  }

  quit(): void {
    this.game = null
  }

  private commit(game: ActiveGame, next: GameState): Snapshot {
    if (next === game.state) return game.snapshot
    this.game = { state: next, snapshot: toSnapshot(next, this.attempts) }
    return this.game.snapshot
  }

  private require(command: string): ActiveGame {
    if (!this.game) throw new NoActiveGameError(command)
    return this.game
  }
}
