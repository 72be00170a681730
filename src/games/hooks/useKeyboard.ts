/**
 * Hook for keyboard handling in terminal games.
 *
 * Wraps Ink's useInput so the handler can change between renders
 * without re-subscribing to stdin.
 */

import { useRef } from 'react'
import { useInput, type Key } from 'ink'

export function useKeyboard(handler: (input: string, key: Key) => void, enabled = true) {
  const handlerRef = useRef(handler)
  handlerRef.current = handler

  useInput((input, key) => {
    handlerRef.current(input, key)
  }, { isActive: enabled })
}
