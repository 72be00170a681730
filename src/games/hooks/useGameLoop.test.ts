// @vitest-environment jsdom
/**
 * Tests for useGameLoop hook.
 */

import { describe, test, expect, beforeEach, vi, afterEach } from 'vitest'
import { renderHook, act } from '@testing-library/react'
import { useGameLoop } from './useGameLoop'

describe('useGameLoop', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  test('ticks once per interval while enabled', () => {
    const onTick = vi.fn()
    renderHook(() => useGameLoop(onTick, 250))
    act(() => {
      vi.advanceTimersByTime(1000)
    })
    expect(onTick).toHaveBeenCalledTimes(4)
  })

  test('does not tick while disabled', () => {
    const onTick = vi.fn()
    renderHook(() => useGameLoop(onTick, 250, false))
    act(() => {
      vi.advanceTimersByTime(1000)
    })
    expect(onTick).not.toHaveBeenCalled()
  })

  test('uses the latest callback', () => {
    const first = vi.fn()
    const second = vi.fn()
    const { rerender } = renderHook(({ cb }) => useGameLoop(cb, 100), {
      initialProps: { cb: first },
    })
    rerender({ cb: second })
    act(() => {
      vi.advanceTimersByTime(100)
    })
    expect(first).not.toHaveBeenCalled()
    expect(second).toHaveBeenCalledTimes(1)
  })

  test('restarts at the new interval when it changes', () => {
    const onTick = vi.fn()
    const { rerender } = renderHook(({ ms }) => useGameLoop(onTick, ms), {
      initialProps: { ms: 400 },
    })
    rerender({ ms: 100 })
    act(() => {
      vi.advanceTimersByTime(400)
    })
    expect(onTick).toHaveBeenCalledTimes(4)
  })

  test('stops on unmount', () => {
    const onTick = vi.fn()
    const { unmount } = renderHook(() => useGameLoop(onTick, 100))
    unmount()
    act(() => {
      vi.advanceTimersByTime(1000)
    })
    expect(onTick).not.toHaveBeenCalled()
  })
})
