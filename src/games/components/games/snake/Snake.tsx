/**
 * Snake game: terminal arcade game with ten levels.
 *
 * Features: start screen and instructions, arrow keys + WASD controls,
 * pause, per-level speed and obstacles, level complete screen,
 * play-again prompt.
 */

import { useState, useCallback, useRef } from 'react'
import { Box, Text, useApp } from 'ink'
import { GameLayout } from '../../GameLayout'
import { GameOverPanel } from '../../GameOverPanel'
import { useGameLoop } from '../../../hooks/useGameLoop'
import { useKeyboard } from '../../../hooks/useKeyboard'
import { mapKey, type Command } from './controls'
import { isFinished } from './gameMachine'
import { InstructionsScreen } from './InstructionsScreen'
import { createIntentBuffer } from './intents'
import { LevelCompletePanel } from './LevelCompletePanel'
import type { SnakeSession } from './session'
import { levelsCompleted, outcomeMessage, progressText, renderRows } from './snapshot'
import { StartScreen } from './StartScreen'
import type { Snapshot } from './types'

interface SnakeProps {
  session: SnakeSession
}

type Screen = 'start' | 'instructions' | 'game' | 'level-complete'

const IDLE_INTERVAL_MS = 1000

function summaryLines(snapshot: Snapshot): string[] {
  const lines = [
    `Level Reached: ${snapshot.level}`,
    `Total Food Eaten: ${snapshot.totalFoodEaten}`,
  ]
  const completed = levelsCompleted(snapshot)
  if (completed > 0) lines.push(`Levels Completed: ${completed}`)
  return lines
}

export default function Snake({ session }: SnakeProps) {
  const { exit } = useApp()
  const intentsRef = useRef(createIntentBuffer())
  // A session that already holds a game is shown as is; otherwise the
  // first game starts from the start screen.
  const [snapshot, setSnapshot] = useState<Snapshot | null>(() =>
    session.isActive ? session.current() : null,
  )
  const [screen, setScreen] = useState<Screen>(() => (session.isActive ? 'game' : 'start'))
  const [completedLevel, setCompletedLevel] = useState(0)
  const levelRef = useRef(snapshot?.level ?? 0)

  const tick = useCallback(() => {
    if (!session.isActive) return
    const next = session.tick(intentsRef.current.next())
    if (next.level !== levelRef.current) {
      // Keys typed on the finished level must not steer the new spawn
      intentsRef.current.clear()
      setCompletedLevel(levelRef.current)
      setScreen('level-complete')
    }
    levelRef.current = next.level
    setSnapshot(next)
  }, [session])

  const running = screen === 'game' && snapshot?.lifecycle === 'running'
  useGameLoop(tick, snapshot ? Math.round(snapshot.tickInterval * 1000) : IDLE_INTERVAL_MS, running)

  const leave = useCallback(() => {
    session.quit()
    exit()
  }, [session, exit])

  const startGame = useCallback(() => {
    intentsRef.current.clear()
    const next = session.newGame()
    levelRef.current = next.level
    setSnapshot(next)
    setScreen('game')
  }, [session])

  const handleGameCommand = (current: Snapshot, command: Command) => {
    const finished = isFinished(current)
    switch (command.type) {
      case 'steer':
        if (current.lifecycle === 'running') intentsRef.current.push(command.direction)
        break
      case 'toggle-pause':
        if (finished) break
        if (current.lifecycle === 'paused') {
          intentsRef.current.clear()
          setSnapshot(session.resume())
        } else {
          setSnapshot(session.pause())
        }
        break
      case 'play-again':
        if (finished) startGame()
        break
      case 'decline':
        if (finished) leave()
        break
      case 'instructions':
        if (finished) setScreen('instructions')
        break
      case 'quit':
      case 'none':
        break
    }
  }

  useKeyboard((input, key) => {
    const command = mapKey(input, key)
    if (command.type === 'quit') {
      leave()
      return
    }
    switch (screen) {
      case 'start':
        if (command.type === 'instructions') setScreen('instructions')
        else startGame()
        break
      case 'instructions':
        setScreen(snapshot ? 'game' : 'start')
        break
      case 'level-complete':
        intentsRef.current.clear()
        setScreen('game')
        break
      case 'game':
        if (snapshot) handleGameCommand(snapshot, command)
        break
    }
  })

  if (screen === 'instructions') {
    return (
      <GameLayout title="Snake">
        <InstructionsScreen levels={session.catalog.getLevels()} />
      </GameLayout>
    )
  }

  if (screen === 'start' || !snapshot) {
    return (
      <GameLayout title="Snake">
        <StartScreen levelCount={session.catalog.maxLevel} />
      </GameLayout>
    )
  }

  const status = `${progressText(snapshot)}   Speed: ${snapshot.tickInterval.toFixed(2)}s`

  if (screen === 'level-complete') {
    return (
      <GameLayout title="Snake" score={snapshot.score} status={status}>
        <LevelCompletePanel completed={completedLevel} next={snapshot} />
      </GameLayout>
    )
  }

  const controls = (
    <Text dimColor>
      {isFinished(snapshot)
        ? 'Y to play again. N or Q to quit. I for instructions.'
        : 'Arrow keys or WASD to move. P to pause. Q to quit.'}
    </Text>
  )

  return (
    <GameLayout title="Snake" score={snapshot.score} status={status} controls={controls}>
      <Text>
        Level {snapshot.level}: {snapshot.levelName} - {snapshot.levelDescription}
      </Text>

      <Box flexDirection="column" marginTop={1}>
        {renderRows(snapshot).map((row, y) => (
          <Text key={y} color="green">{row}</Text>
        ))}
      </Box>

      {snapshot.lifecycle === 'paused' && (
        <Text color="cyan">PAUSED - press P to resume, Q to quit</Text>
      )}

      {isFinished(snapshot) && (
        <GameOverPanel
          status={snapshot.lifecycle === 'victory' ? 'won' : 'lost'}
          score={snapshot.score}
          message={outcomeMessage(snapshot)}
          details={summaryLines(snapshot)}
        />
      )}
    </GameLayout>
  )
}
