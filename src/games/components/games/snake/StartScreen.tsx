/**
 * Welcome screen shown before the first game of a session.
 */

import { Box, Text } from 'ink'

const HOW_TO_PLAY = [
  'Steer the snake with the arrow keys or WASD',
  'Eat food (@) to grow and score points',
  'Avoid walls, obstacles and your own tail',
  'Eat enough food to complete the level',
  'Each level is faster and has new obstacles',
]

export function StartScreen({ levelCount }: { levelCount: number }) {
  return (
    <Box flexDirection="column">
      <Text bold>Welcome to Snake!</Text>

      <Box flexDirection="column" marginTop={1}>
        <Text underline>How to Play</Text>
        {HOW_TO_PLAY.map(line => <Text key={line}>- {line}</Text>)}
      </Box>

      <Box marginTop={1}>
        <Text>{levelCount} levels of increasing difficulty.</Text>
      </Box>

      <Box marginTop={1}>
        <Text color="yellow">Press any key to start, I for instructions, Q to quit</Text>
      </Box>
    </Box>
  )
}
