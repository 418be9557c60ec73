import { Link } from 'react-router-dom'
import { Building2, CircleDollarSign, Users } from 'lucide-react'
import type { CountryEntry } from '../services/worldBank'
import { flagEmoji } from '../utils/flag'
import { formatPopulation, formatUsd } from '../utils/format'

export default function CountryRow({ country }: { country: CountryEntry }) {
  return (
    <li>
      <Link
        to={`/countries/${encodeURIComponent(country.code)}`}
        className="flex items-center gap-3 rounded-lg px-2 py-2 hover:bg-slate-50"
      >
        <span className="text-4xl" aria-hidden="true">{flagEmoji(country.code)}</span>
        <div className="min-w-0">
          <div className="font-medium">{country.name}</div>
          <div className="text-sm text-slate-600 flex gap-4">
            <span className="inline-flex items-center gap-1">
              <Building2 className="h-3.5 w-3.5 opacity-70" aria-hidden="true" />
              {country.capitalCity}
            </span>
            <span className="font-mono">{country.code}</span>
          </div>
          <div className="text-xs text-slate-500 flex gap-3">
            {country.population !== undefined && (
              <span className="inline-flex items-center gap-1">
                <Users className="h-3 w-3" aria-hidden="true" />
                <span data-field="population">{formatPopulation(country.population)} people</span>
              </span>
            )}
            {country.gdp !== undefined && (
              <span className="inline-flex items-center gap-1">
                <CircleDollarSign className="h-3 w-3" aria-hidden="true" />
                <span data-field="gdp">{formatUsd(country.gdp)}</span>
              </span>
            )}
          </div>
        </div>
      </Link>
    </li>
  )
}
