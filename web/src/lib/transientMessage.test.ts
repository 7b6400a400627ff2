import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { createTransientMessage, TRANSIENT_MESSAGE_MS } from './transientMessage'

describe('createTransientMessage', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('shows a message and clears it after three seconds', () => {
    const onChange = vi.fn()
    const transient = createTransientMessage(onChange)

    transient.show('Mail sent successfully!')
    expect(onChange).toHaveBeenLastCalledWith('Mail sent successfully!')

    vi.advanceTimersByTime(2999)
    expect(onChange).toHaveBeenCalledTimes(1)

    vi.advanceTimersByTime(1)
    expect(onChange).toHaveBeenCalledTimes(2)
    expect(onChange).toHaveBeenLastCalledWith(null)
    expect(TRANSIENT_MESSAGE_MS).toBe(3000)
  })

  it('restarts the countdown when a newer message arrives', () => {
    const onChange = vi.fn()
    const transient = createTransientMessage(onChange)

    transient.show('first')
    vi.advanceTimersByTime(2000)
    transient.show('second')

    vi.advanceTimersByTime(1000)
    expect(onChange.mock.calls).toEqual([['first'], ['second']])

    vi.advanceTimersByTime(2000)
    expect(onChange.mock.calls).toEqual([['first'], ['second'], [null]])
    expect(vi.getTimerCount()).toBe(0)
  })

  it('drops the pending clear on dispose', () => {
    const onChange = vi.fn()
    const transient = createTransientMessage(onChange, 500)

    transient.show('bye')
    transient.dispose()
    vi.advanceTimersByTime(500)

    expect(onChange.mock.calls).toEqual([['bye']])
  })
})
