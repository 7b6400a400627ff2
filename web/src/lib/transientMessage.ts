export const TRANSIENT_MESSAGE_MS = 3000

export type TransientMessage = {
  show: (message: string) => void
  dispose: () => void
}

/**
 * Reports `message` through `onChange`, then `null` once `durationMs` has
 * passed. A newer message restarts the countdown.
 */
export function createTransientMessage(
  onChange: (message: string | null) => void,
  durationMs = TRANSIENT_MESSAGE_MS,
): TransientMessage {
  let timer: ReturnType<typeof setTimeout> | null = null

  function clear() {
    if (timer !== null) {
      clearTimeout(timer)
      timer = null
    }
  }

  return {
    show(message) {
      clear()
      onChange(message)
      timer = setTimeout(() => {
        timer = null
        onChange(null)
      }, durationMs)
    },
    dispose: clear,
  }
}
