/**
 * Snake game types shared by the engine, the session and the terminal view.
 */

export type Direction = 'UP' | 'DOWN' | 'LEFT' | 'RIGHT'

/** A direction request for the next tick; NONE keeps the current heading. */
export type Intent = Direction | 'NONE'

export interface Position {
  x: number
  y: number
}

/** Full grid size, wall ring included. */
export interface Board {
  width: number
  height: number
}

export interface Spawn {
  head: Position
  heading: Direction
  length: number
}

export interface SnakeBody {
  /** Head first. */
  segments: readonly Position[]
  heading: Direction
  /** Number of upcoming moves that keep the tail. */
  pendingGrowth: number
}

export interface LevelDefinition {
  level: number
  name: string
  description: string
  board: Board
  obstacles: readonly Position[]
  spawn: Spawn
  /** Seconds between ticks. */
  tickInterval: number
  foodToAdvance: number
}

export type Lifecycle = 'running' | 'paused' | 'level-complete' | 'game-over' | 'victory'

export type CollisionKind = 'wall' | 'obstacle' | 'self'

export interface GameState {
  level: LevelDefinition
  score: number
  snake: SnakeBody
  food: Position | null
  /** Food eaten on the current level. */
  foodEaten: number
  totalFoodEaten: number
  lifecycle: Lifecycle
  collision: CollisionKind | null
}

export type CellKind = 'empty' | 'wall' | 'obstacle' | 'snake-body' | 'snake-head' | 'food'

export interface Snapshot {
  lifecycle: Lifecycle
  level: number
  levelName: string
  levelDescription: string
  score: number
  foodEaten: number
  foodTarget: number
  totalFoodEaten: number
  attempt: number
  tickInterval: number
  heading: Direction
  snake: readonly Position[]
  food: Position | null
  collision: CollisionKind | null
  board: Board
  /** Indexed as cells[y][x]. */
  cells: readonly (readonly CellKind[])[]
}
