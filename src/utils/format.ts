// src/utils/format.ts

const integer = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 })
const usd = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
})

export function formatPopulation(n: number) {
  return integer.format(n)
}

export function formatUsd(n: number) {
  return usd.format(n)
}
