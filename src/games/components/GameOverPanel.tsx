/**
 * Shared game over panel: shown when a game ends in a win or a loss.
 *
 * Displays the status title, an optional message, the final score, any
 * extra summary lines and the play-again prompt.
 */

import { Box, Text } from 'ink'
import type { GameStatus } from '../types'

interface GameOverPanelProps {
  status: GameStatus
  score?: number
  message?: string | null
  details?: string[]
  playAgainText?: string
}

const STATUS_CONFIG: Partial<Record<GameStatus, { title: string; color: string }>> = {
  won: { title: 'You Win!', color: 'green' },
  lost: { title: 'Game Over', color: 'red' },
}

export function GameOverPanel({ status, score, message, details, playAgainText }: GameOverPanelProps) {
  const config = STATUS_CONFIG[status]
  if (!config) return null

  return (
    <Box flexDirection="column" borderStyle="round" borderColor={config.color} paddingX={2}>
      <Text bold color={config.color}>{config.title}</Text>

      {message && <Text dimColor>{message}</Text>}

      {score !== undefined && <Text>Final Score: {score}</Text>}

      {details?.map(line => <Text key={line}>{line}</Text>)}

      <Box marginTop={1}>
        <Text>{playAgainText || 'Play again?'} (y/n)</Text>
      </Box>
    </Box>
  )
}
