import { useMemo } from 'react'
import Card from '../components/Card'
import CountryRow from '../components/CountryRow'
import ErrorState from '../components/ErrorState'
import Loading from '../components/Loading'
import type { SessionState } from '../services/session'

export default function CountryList({ state, onRetry }: { state: SessionState; onRetry?: () => void }) {
  // regions alphabetically; countries keep pipeline order
  const regions = useMemo(
    () => (state.status === 'loaded' ? Object.keys(state.regions).sort((a, b) => a.localeCompare(b)) : []),
    [state]
  )

  if (state.status === 'loading') return <Loading label="Loading countries..." />
  if (state.status === 'error') return <ErrorState message={state.message} onRetry={onRetry} />

  if (!regions.length) {
    return <div className="text-sm text-slate-600">No countries available.</div>
  }

  return (
    <div className="space-y-6">
      {regions.map(region => {
        const countries = state.regions[region] ?? []
        return (
          <Card
            key={region}
            title={region}
            right={<span className="text-xs text-slate-500">{countries.length} countries</span>}
          >
            <ul className="divide-y">
              {countries.map(c => (
                <CountryRow key={c.code} country={c} />
              ))}
            </ul>
          </Card>
        )
      })}
    </div>
  )
}
