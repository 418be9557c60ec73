import { Routes, Route, NavLink } from 'react-router-dom'
import { useCountrySession } from './hooks/useCountrySession'
import CountryDetail from './pages/CountryDetail'
import CountryList from './pages/CountryList'

export default function App() {
  const { state, retry } = useCountrySession()

  return (
    <div className="min-h-screen">
      <header className="sticky top-0 z-10 bg-white/70 backdrop-blur border-b">
        <div className="max-w-5xl mx-auto px-4 py-3 flex items-center justify-between">
          <NavLink
            to="/"
            end
            className="text-xl md:text-2xl font-semibold rounded-lg px-2 py-1 hover:bg-slate-100 focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-slate-400"
            aria-label="Go to the country list"
          >
            World Countries
          </NavLink>
        </div>
      </header>

      <main className="max-w-5xl mx-auto px-4 py-6 space-y-6">
        <Routes>
          <Route path="/" element={<CountryList state={state} onRetry={retry} />} />
          <Route path="/countries/:code" element={<CountryDetail state={state} />} />
          <Route path="*" element={<CountryList state={state} onRetry={retry} />} />
        </Routes>
      </main>

      <footer className="border-t py-6 text-center text-sm text-slate-500">
        Data: World Bank Open Data (population SP.POP.TOTL, GDP NY.GDP.MKTP.CD). Maps: OpenStreetMap.
      </footer>
    </div>
  )
}
