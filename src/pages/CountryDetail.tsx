import { useEffect, useMemo, useState } from 'react'
import { Link, useParams } from 'react-router-dom'
import { CircleDollarSign, Users, type LucideIcon } from 'lucide-react'
import CapitalMap from '../components/CapitalMap'
import ErrorState from '../components/ErrorState'
import Loading from '../components/Loading'
import { nominatimGeocoder, type GeoPoint, type Geocoder } from '../services/geocode'
import { logError } from '../services/log'
import type { SessionState } from '../services/session'
import type { CountryEntry } from '../services/worldBank'
import { flagEmoji } from '../utils/flag'
import { formatPopulation, formatUsd } from '../utils/format'

type Located =
  | { status: 'locating' }
  | { status: 'found'; point: GeoPoint }
  | { status: 'missing' }

function findCountry(state: SessionState, code: string): CountryEntry | null {
  if (state.status !== 'loaded') return null
  for (const countries of Object.values(state.regions)) {
    const hit = countries.find(c => c.code === code)
    if (hit) return hit
  }
  return null
}

function DetailRow({ label, value, icon: Icon }: { label: string; value: string; icon: LucideIcon }) {
  return (
    <div className="flex items-center justify-between rounded-lg bg-slate-100 px-4 py-3">
      <span className="inline-flex items-center gap-2">
        <Icon className="h-4 w-4" aria-hidden="true" />
        {label}
      </span>
      <span className="tabular-nums">{value}</span>
    </div>
  )
}

export default function CountryDetail({
  state,
  geocoder = nominatimGeocoder,
}: {
  state: SessionState
  geocoder?: Geocoder
}) {
  const { code = '' } = useParams()
  const country = useMemo(() => findCountry(state, code.toUpperCase()), [state, code])
  const [located, setLocated] = useState<Located>({ status: 'locating' })

  useEffect(() => {
    if (!country) return
    const controller = new AbortController()
    setLocated({ status: 'locating' })
    geocoder
      .locate(`${country.capitalCity}, ${country.name}`, { signal: controller.signal })
      .then(point => {
        if (!controller.signal.aborted) setLocated(point ? { status: 'found', point } : { status: 'missing' })
      })
      .catch((err: unknown) => {
        if (controller.signal.aborted) return
        logError(err, `geocode:${country.code}`)
        setLocated({ status: 'missing' })
      })
    return () => controller.abort()
  }, [country, geocoder])

  if (state.status === 'loading') return <Loading label="Loading countries..." />
  if (state.status === 'error') return <ErrorState message={state.message} />
  if (!country) {
    return (
      <div className="space-y-2 text-sm">
        <p>No country with code “{code}”.</p>
        <Link to="/" className="text-blue-600 underline">Back to the list</Link>
      </div>
    )
  }

  const flag = flagEmoji(country.code)

  return (
    <article className="space-y-5">
      <Link to="/" className="text-sm text-blue-600 underline">All countries</Link>
      <header className="flex items-start justify-between">
        <div>
          <div className="text-5xl" aria-hidden="true">{flag}</div>
          <h1 className="text-2xl font-semibold">{country.name}</h1>
          <div className="font-mono font-bold">{country.code}</div>
        </div>
        <div className="text-right">
          <div className="text-lg font-bold">{country.capitalCity}</div>
          <div className="text-xs text-slate-500">Capital City</div>
        </div>
      </header>

      {located.status === 'locating' && <Loading label="Locating country..." />}
      {located.status === 'missing' && <ErrorState message={`Could not find location for ${country.name}`} />}
      {located.status === 'found' && <CapitalMap point={located.point} flag={flag} capital={country.capitalCity} />}

      <section className="space-y-3">
        {country.population !== undefined && (
          <DetailRow label="Population" value={formatPopulation(country.population)} icon={Users} />
        )}
        {country.gdp !== undefined && <DetailRow label="GDP" value={formatUsd(country.gdp)} icon={CircleDollarSign} />}
      </section>
    </article>
  )
}
