import { useEffect, useMemo, useState } from 'react'

import { createTransientMessage, TRANSIENT_MESSAGE_MS } from './transientMessage'

/** A message that clears itself after `durationMs`. */
export function useTransientMessage(durationMs = TRANSIENT_MESSAGE_MS): [string | null, (message: string) => void] {
  const [message, setMessage] = useState<string | null>(null)
  const transient = useMemo(() => createTransientMessage(setMessage, durationMs), [durationMs])

  useEffect(() => transient.dispose, [transient])

  return [message, transient.show]
}
