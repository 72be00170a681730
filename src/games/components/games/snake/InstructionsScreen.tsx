/**
 * Instructions page: objective, scoring and the level list.
 *
 * Reachable from the start screen and from the play-again prompt.
 */

import { Box, Text } from 'ink'
import { FOOD_REWARD, LEVEL_BONUS } from './gameMachine'
import type { LevelDefinition } from './types'

interface InstructionsScreenProps {
  levels: readonly LevelDefinition[]
}

export function InstructionsScreen({ levels }: InstructionsScreenProps) {
  const foodTarget = levels[0]?.foodToAdvance ?? 0

  return (
    <Box flexDirection="column">
      <Text bold>Instructions</Text>

      <Box flexDirection="column" marginTop={1}>
        <Text underline>Objective</Text>
        <Text>Guide the snake to the food while avoiding obstacles.</Text>
        <Text>Complete all {levels.length} levels to win the game!</Text>
      </Box>

      <Box flexDirection="column" marginTop={1}>
        <Text underline>Scoring</Text>
        <Text>- Food eaten: +{FOOD_REWARD} points each</Text>
        <Text>- Level completion: +{LEVEL_BONUS} bonus points</Text>
        <Text>- Eat {foodTarget} food to complete a level</Text>
      </Box>

      <Box flexDirection="column" marginTop={1}>
        <Text underline>Levels</Text>
        {levels.map(level => (
          <Text key={level.level}>
            Level {level.level}: {level.name} - {level.description}
          </Text>
        ))}
      </Box>

      <Box marginTop={1}>
        <Text color="yellow">Press any key to go back</Text>
      </Box>
    </Box>
  )
}
