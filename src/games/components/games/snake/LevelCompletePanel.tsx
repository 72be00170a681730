import { Box, Text } from 'ink'
import { LEVEL_BONUS } from './gameMachine'
import type { Snapshot } from './types'

interface LevelCompletePanelProps {
  completed: number
  next: Snapshot
}

/** Shown between levels; the next level waits until a key is pressed. */
export function LevelCompletePanel({ completed, next }: LevelCompletePanelProps) {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor="yellow" paddingX={2}>
      <Text bold color="yellow">Level Complete!</Text>
      <Text>Level {completed} completed!</Text>
      <Text>Bonus: +{LEVEL_BONUS} points</Text>
      <Text>Total Score: {next.score}</Text>

      <Box flexDirection="column" marginTop={1}>
        <Text>Next: Level {next.level}: {next.levelName}</Text>
        <Text dimColor>{next.levelDescription}</Text>
      </Box>

      <Box marginTop={1}>
        <Text>Press any key to continue...</Text>
      </Box>
    </Box>
  )
}
