import { BOLTZMANN_DB } from './constants'
import { dbToLinear, linearToDb } from './units'

/** Power at the receive antenna terminals in dBW */
export function receivedPower(eirpDbw: number, pathLossDb: number, rxGainDb: number): number {
  return eirpDbw - pathLossDb + rxGainDb
}

/** Receive figure of merit G/T in dB/K */
export function gainOverTemperature(rxGainDb: number, systemNoiseTempDbK: number): number {
  return rxGainDb - systemNoiseTempDbK
}

/**
 * Carrier-to-noise ratio in dB. Noise power is k·Tsys·B, so each factor is
 * subtracted in dB.
 */
export function cnr(
  eirpDbw: number,
  pathLossDb: number,
  rxGainDb: number,
  systemNoiseTempDbK: number,
  bandwidth: number
): number {
  const gOverT = gainOverTemperature(rxGainDb, systemNoiseTempDbK)
  return eirpDbw - pathLossDb + gOverT - BOLTZMANN_DB - linearToDb(bandwidth)
}

/** Shannon-Hartley channel capacity in bits per second */
export function capacity(snrDb: number, bandwidth: number): number {
  return bandwidth * Math.log2(1 + dbToLinear(snrDb))
}
