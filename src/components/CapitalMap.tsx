import { MapContainer, TileLayer, Marker, Popup } from 'react-leaflet'
import L from 'leaflet'
import { useMemo } from 'react'
import { regionAround, type GeoPoint } from '../services/geocode'

/** Inline SVG marker with the flag inside (no external assets) */
function flagMarker(flag: string) {
  const svg = `
    <svg xmlns="http://www.w3.org/2000/svg" width="48" height="48" viewBox="0 0 48 48">
      <circle cx="24" cy="24" r="18" fill="#ffffff" stroke="#1d4ed8" stroke-width="2" />
      <text x="24" y="31" text-anchor="middle" font-size="22" font-family="system-ui, -apple-system, Segoe UI, Emoji">${flag}</text>
    </svg>
  `.trim()

  return L.icon({
    iconUrl: 'data:image/svg+xml;charset=UTF-8,' + encodeURIComponent(svg),
    iconSize: [40, 40],
    iconAnchor: [20, 20],
    popupAnchor: [0, -20],
  })
}

export default function CapitalMap({
  point,
  flag,
  capital,
}: {
  point: GeoPoint
  flag: string
  capital: string
}) {
  const icon = useMemo(() => flagMarker(flag), [flag])
  const bounds = useMemo(() => regionAround(point), [point])

  return (
    <div className="h-[400px] rounded-xl overflow-hidden border">
      <MapContainer bounds={bounds} scrollWheelZoom={true} style={{ height: '100%', width: '100%' }}>
        <TileLayer
          attribution='&copy; OpenStreetMap contributors'
          url="https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png"
        />
        <Marker position={[point.lat, point.lon]} icon={icon}>
          <Popup>
            <div className="font-semibold text-sm">{capital}</div>
          </Popup>
        </Marker>
      </MapContainer>
    </div>
  )
}
