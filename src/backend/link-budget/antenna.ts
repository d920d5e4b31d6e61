import { DISH_GAIN_FACTOR } from './constants'
import { linearToDb, wavelength } from './units'

/**
 * Gain of a parabolic dish, assuming a circular aperture at 56% efficiency.
 *
 * @param diameter - Dish diameter in meters
 * @param frequency - Frequency of interest in Hz
 * @returns Gain in dBi
 */
export function dishGain(diameter: number, frequency: number): number {
  const radius = diameter / 2
  const faceArea = Math.PI * radius ** 2
  const lambda = wavelength(frequency)

  return linearToDb((DISH_GAIN_FACTOR * faceArea) / lambda ** 2)
}

/** EIRP (dBW) = power feeding the antenna (dBW) + antenna gain (dB) */
export function eirp(txPowerDbw: number, txGainDb: number): number {
  return txPowerDbw + txGainDb
}
