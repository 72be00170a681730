/**
 * Shared game screen wrapper: consistent chrome for terminal games.
 *
 * Renders: game title, optional score and status, the game content and an
 * optional controls hint underneath.
 */

import type { ReactNode } from 'react'
import { Box, Text } from 'ink'

interface GameLayoutProps {
  title: string
  children: ReactNode
  score?: number
  status?: string
  controls?: ReactNode
}

export function GameLayout({ title, children, score, status, controls }: GameLayoutProps) {
  return (
    <Box flexDirection="column">
      {/* Header */}
      <Box>
        <Box marginRight={4}>
          <Text bold color="green">{title}</Text>
        </Box>
        {score !== undefined && (
          <Box marginRight={4}>
            <Text>Score: {score}</Text>
          </Box>
        )}
        {status && <Text color="cyan">{status}</Text>}
      </Box>

      {/* Game board area */}
      <Box flexDirection="column" marginY={1}>
        {children}
      </Box>

      {controls && <Box>{controls}</Box>}
    </Box>
  )
}
