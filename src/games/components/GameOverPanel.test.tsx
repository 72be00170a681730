/**
 * Tests for GameOverPanel component.
 */

import { describe, test, expect } from 'vitest'
import { render } from 'ink-testing-library'
import { GameOverPanel } from './GameOverPanel'

describe('GameOverPanel', () => {
  test('shows the loss title, message and score', () => {
    const { lastFrame } = render(
      <GameOverPanel status="lost" score={120} message="You bit yourself!" />,
    )
    const frame = lastFrame() ?? ''
    expect(frame).toContain('Game Over')
    expect(frame).toContain('You bit yourself!')
    expect(frame).toContain('Final Score: 120')
    expect(frame).toContain('Play again? (y/n)')
  })

  test('shows the win title and detail lines', () => {
    const { lastFrame } = render(
      <GameOverPanel status="won" score={800} details={['Level Reached: 10', 'Levels Completed: 10']} />,
    )
    const frame = lastFrame() ?? ''
    expect(frame).toContain('You Win!')
    expect(frame).toContain('Level Reached: 10')
    expect(frame).toContain('Levels Completed: 10')
  })

  test('uses custom play-again text', () => {
    const { lastFrame } = render(<GameOverPanel status="lost" playAgainText="Try again?" />)
    expect(lastFrame()).toContain('Try again? (y/n)')
  })

  test('renders nothing while the game is still going', () => {
    const { lastFrame } = render(<GameOverPanel status="playing" score={10} />)
    expect(lastFrame() ?? '').toBe('')
  })
})
