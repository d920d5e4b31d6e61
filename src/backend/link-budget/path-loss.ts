import { InvalidInputError } from '../errors'
import { linearToDb, wavelength } from './units'

export interface PathLossOptions {
  /** Account for the path to and back from a passive reflector */
  radar?: boolean
  /** Radar cross section in m² (required in radar mode) */
  rcs?: number
  /** Transmitter and receiver are not collocated */
  bistatic?: boolean
  /** Bistatic mode only: distance from the object to the receiver in meters */
  rxDistance?: number
}

/** One-way free-space path loss in dB over `distance` meters */
export function freeSpacePathLoss(distance: number, frequency: number): number {
  return 20 * Math.log10((4 * Math.PI * distance) / wavelength(frequency))
}

/**
 * Gain of a radar object, treating the power it intercepts over its cross
 * section as reradiated isotropically.
 */
export function radarObjectGain(rcs: number, frequency: number): number {
  return linearToDb((4 * Math.PI * rcs) / wavelength(frequency) ** 2)
}

/**
 * Free-space path loss, or the radar transmission loss when `radar` is set.
 *
 * Monostatic radar counts the one-way loss twice and credits the object gain.
 * Bistatic radar sums the loss of each leg at its own distance instead.
 */
export function pathLoss(distance: number, frequency: number, options: PathLossOptions = {}): number {
  const { radar = false, rcs, bistatic = false, rxDistance } = options

  if (!radar) {
    return freeSpacePathLoss(distance, frequency)
  }

  if (rcs === undefined) {
    throw new InvalidInputError('Radar cross section required in radar mode')
  }

  if (bistatic && rxDistance === undefined) {
    throw new InvalidInputError('Rx distance required in bistatic radar mode')
  }

  const objectGainDb = radarObjectGain(rcs, frequency)
  const txLegDb = freeSpacePathLoss(distance, frequency)

  if (bistatic && rxDistance !== undefined) {
    return txLegDb + freeSpacePathLoss(rxDistance, frequency) - objectGainDb
  }

  return 2 * txLegDb - objectGainDb
}
