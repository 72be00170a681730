/**
 * Hook for a fixed-interval game loop.
 *
 * Calls onTick every intervalMs while enabled. The latest callback is
 * always used, so callers do not need to memoize it.
 */

import { useEffect, useRef } from 'react'

export function useGameLoop(onTick: () => void, intervalMs: number, enabled = true) {
  const tickRef = useRef(onTick)
  tickRef.current = onTick

  useEffect(() => {
    if (!enabled) return
    const interval = setInterval(() => {
      tickRef.current()
    }, intervalMs)
    return () => clearInterval(interval)
  }, [enabled, intervalMs])
}
