import { SPEED_OF_LIGHT } from './constants'

export function dbToLinear(db: number): number {
  return 10 ** (db / 10)
}

export function linearToDb(value: number): number {
  return 10 * Math.log10(value)
}

export function dbwToDbm(dbw: number): number {
  return dbw + 30
}

export function wavelength(frequencyHz: number): number {
  return SPEED_OF_LIGHT / frequencyHz
}

export function formatRate(bps: number): string {
  if (bps >= 1e9) return `${(bps / 1e9).toFixed(2)} Gbps`
  if (bps >= 1e6) return `${(bps / 1e6).toFixed(2)} Mbps`
  if (bps >= 1e3) return `${(bps / 1e3).toFixed(2)} kbps`
  return `${bps.toFixed(2)} bps`
}
