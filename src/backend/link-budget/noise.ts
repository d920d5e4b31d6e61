import { InvalidInputError } from '../errors'
import type { CoaxLine } from '../types'
import { RG6_LOSS_DB_PER_FT, T0 } from './constants'
import { dbToLinear, linearToDb } from './units'

/**
 * Loss and noise figure of a coaxial transmission line.
 *
 * A passive line at T0 has a noise figure equal to its loss in dB. Away from
 * T0 the attenuator noise factor is 1 + (Tl/T0)(L - 1).
 *
 * @param lengthFt - Line length in feet
 * @param lineTempK - Physical temperature of the line
 * @param lossDbPerFt - Line attenuation, RG6 by default
 */
export function coaxLossAndNoiseFigure(
  lengthFt: number,
  lineTempK = T0,
  lossDbPerFt = RG6_LOSS_DB_PER_FT
): CoaxLine {
  const lossDb = lengthFt * lossDbPerFt
  const noiseFactor = 1 + (lineTempK / T0) * (dbToLinear(lossDb) - 1)

  return { lossDb, noiseFigureDb: linearToDb(noiseFactor) }
}

/**
 * Overall noise figure of cascaded stages (Friis).
 *
 * `gainsDb` omits the last stage, whose gain does not affect the result, so
 * it must hold exactly one entry fewer than `noiseFiguresDb`.
 */
export function totalNoiseFigure(noiseFiguresDb: readonly number[], gainsDb: readonly number[]): number {
  const [first, ...rest] = noiseFiguresDb

  if (first === undefined) {
    throw new InvalidInputError('Noise cascade needs at least one stage')
  }

  if (gainsDb.length !== noiseFiguresDb.length - 1) {
    throw new InvalidInputError(
      `Noise cascade of ${noiseFiguresDb.length} stages needs ${noiseFiguresDb.length - 1} gains, got ${gainsDb.length}`
    )
  }

  if (rest.length === 0) {
    return first
  }

  let noiseFactor = dbToLinear(first)
  let gainProduct = 1

  rest.forEach((nf, index) => {
    gainProduct *= dbToLinear(gainsDb[index] ?? 0)
    noiseFactor += (dbToLinear(nf) - 1) / gainProduct
  })

  return linearToDb(noiseFactor)
}

/** Effective input-noise temperature (K) of a device with the given noise figure (dB) */
export function noiseFigureToNoiseTemp(noiseFigureDb: number): number {
  return T0 * (dbToLinear(noiseFigureDb) - 1)
}

/** Noise figure (dB) of a device with the given effective input-noise temperature (K) */
export function noiseTempToNoiseFigure(noiseTempK: number): number {
  return linearToDb(1 + noiseTempK / T0)
}

/**
 * Receiver system noise temperature.
 *
 * The antenna temperature (sky and ground radiation) adds to the receiver's
 * effective input-noise temperature rather than entering the cascade as
 * another stage.
 */
export function systemNoiseTemp(antennaNoiseTempK: number, effectiveInputNoiseTempK: number): number {
  return antennaNoiseTempK + effectiveInputNoiseTempK
}
