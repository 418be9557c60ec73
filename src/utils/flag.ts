// src/utils/flag.ts

const REGIONAL_INDICATOR_A = 0x1f1e6

/** Flag emoji from a two-letter code ("FR" -> 🇫🇷); "" for anything else. */
export function flagEmoji(code: string): string {
  const cc = code.trim().toUpperCase()
  if (!/^[A-Z]{2}$/.test(cc)) return ''
  return String.fromCodePoint(
    ...[...cc].map(ch => REGIONAL_INDICATOR_A + ch.charCodeAt(0) - 65)
  )
}
