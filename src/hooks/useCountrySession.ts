import { useCallback, useEffect, useState, useSyncExternalStore } from 'react'
import { createCountrySession, type CountrySession, type SessionState } from '../services/session'

const PENDING: SessionState = { status: 'loading' }
const noopSubscribe = () => () => {}
const pendingSnapshot = () => PENDING

/**
 * Starts a session on mount and cancels it on unmount.
 * retry() throws the finished session away and starts a fresh one.
 */
export function useCountrySession(create: () => CountrySession = createCountrySession) {
  const [session, setSession] = useState<CountrySession | null>(null)
  const [attempt, setAttempt] = useState(0)

  useEffect(() => {
    const s = create()
    setSession(s)
    void s.run()
    return () => s.cancel()
  }, [attempt, create])

  const state = useSyncExternalStore(
    session ? session.subscribe : noopSubscribe,
    session ? session.getSnapshot : pendingSnapshot
  )

  const retry = useCallback(() => setAttempt(a => a + 1), [])

  return { state, retry }
}
