import { InvalidInputError } from '@backend/errors'
import { dishGain, eirp } from '@backend/link-budget/antenna'
import { capacity, cnr, gainOverTemperature, receivedPower } from '@backend/link-budget/carrier'
import { GEOSTATIONARY_ALTITUDE_M, RG6_LOSS_DB_PER_FT, T0 } from '@backend/link-budget/constants'
import {
  coaxLossAndNoiseFigure,
  noiseFigureToNoiseTemp,
  noiseTempToNoiseFigure,
  systemNoiseTemp,
  totalNoiseFigure,
} from '@backend/link-budget/noise'
import { type PathLossOptions, pathLoss } from '@backend/link-budget/path-loss'
import { dbwToDbm, linearToDb } from '@backend/link-budget/units'
import { lookAngles } from '@backend/pointing/look-angles'
import type {
  Antenna,
  BudgetStageEvent,
  LinkBudgetInput,
  LinkBudgetResult,
  PointingModel,
  RadarOptions,
  TransmitPower,
} from '@backend/types'

export interface AnalyzeOptions {
  pointingModel?: PointingModel
  coax?: {
    lossDbPerFt?: number
    lineTempK?: number
  }
  /** Called after each pipeline stage with the quantities it produced */
  onStage?: (event: BudgetStageEvent) => void
}

type Emit = (event: BudgetStageEvent) => void

function antennaGain(antenna: Antenna, frequency: number): number {
  return antenna.kind === 'dishGain' ? antenna.gainDb : dishGain(antenna.diameter, frequency)
}

function resolveEirp(transmit: TransmitPower, frequency: number, emit: Emit): number {
  if (transmit.kind === 'eirp') {
    return transmit.eirpDbw
  }

  const txGainDb = antennaGain(transmit.antenna, frequency)
  if (transmit.antenna.kind === 'dishSize') {
    emit({ stage: 'txDishGain', gainDb: txGainDb })
  }
  emit({ stage: 'txPower', txPowerDbw: transmit.txPowerDbw })

  return eirp(transmit.txPowerDbw, txGainDb)
}

function radarPathOptions(radar: RadarOptions | undefined): PathLossOptions {
  if (!radar) return {}

  if (radar.bistatic && radar.rxDistance === undefined) {
    throw new InvalidInputError('Rx distance required in bistatic radar mode')
  }

  return {
    radar: true,
    rcs: radar.crossSection,
    bistatic: radar.bistatic,
    rxDistance: radar.rxDistance,
  }
}

/**
 * Run the full link budget: look angles, EIRP, path loss over the slant
 * range, receive chain noise, CNR and capacity.
 *
 * The reflector sits at geostationary altitude unless radar mode supplies the
 * object's altitude. Radar options are checked before anything is computed.
 */
export function analyzeLinkBudget(input: LinkBudgetInput, options: AnalyzeOptions = {}): LinkBudgetResult {
  const { pointingModel = 'ellipsoidal', onStage } = options
  const coaxLossDbPerFt = options.coax?.lossDbPerFt ?? RG6_LOSS_DB_PER_FT
  const coaxLineTempK = options.coax?.lineTempK ?? T0
  const emit: Emit = (event) => onStage?.(event)

  const pathOptions = radarPathOptions(input.radar)
  const altitude = input.radar ? input.radar.altitude : GEOSTATIONARY_ALTITUDE_M

  const pointing = lookAngles(
    input.satLongitude,
    input.rxLongitude,
    input.rxLatitude,
    altitude,
    pointingModel,
    input.rxHeight
  )
  emit({ stage: 'pointing', lookAngles: pointing })

  const eirpDbw = resolveEirp(input.transmit, input.frequency, emit)
  emit({ stage: 'eirp', eirpDbw })

  const pathLossDb = pathLoss(pointing.slantRange, input.frequency, pathOptions)
  emit({ stage: 'pathLoss', pathLossDb })

  const rxDishGainDb = antennaGain(input.rxAntenna, input.frequency)
  if (input.rxAntenna.kind === 'dishSize') {
    emit({ stage: 'rxDishGain', gainDb: rxDishGainDb })
  }

  const coax = coaxLossAndNoiseFigure(input.coaxLengthFt, coaxLineTempK, coaxLossDbPerFt)
  emit({ stage: 'coax', lossDb: coax.lossDb, noiseFigureDb: coax.noiseFigureDb })

  const lnbNoise = input.lnb.noise
  const lnbNoiseFigureDb =
    lnbNoise.kind === 'noiseFigure' ? lnbNoise.noiseFigureDb : noiseTempToNoiseFigure(lnbNoise.noiseTempK)
  emit({ stage: 'lnbNoiseFigure', noiseFigureDb: lnbNoiseFigureDb })

  // LNB -> coax -> receiver; the receiver's own gain does not enter the cascade
  const totalNoiseFigureDb = totalNoiseFigure(
    [lnbNoiseFigureDb, coax.noiseFigureDb, input.rxNoiseFigureDb],
    [input.lnb.gainDb, -coax.lossDb]
  )
  emit({ stage: 'totalNoiseFigure', noiseFigureDb: totalNoiseFigureDb })

  const effectiveInputK = noiseFigureToNoiseTemp(totalNoiseFigureDb)
  const systemK = systemNoiseTemp(input.antennaNoiseTempK, effectiveInputK)
  emit({ stage: 'noiseTemp', antennaK: input.antennaNoiseTempK, effectiveInputK, systemK })

  const systemTempDbK = linearToDb(systemK)
  const rxPowerDbm = dbwToDbm(receivedPower(eirpDbw, pathLossDb, rxDishGainDb))
  const gOverTDb = gainOverTemperature(rxDishGainDb, systemTempDbK)
  const cnrDb = cnr(eirpDbw, pathLossDb, rxDishGainDb, systemTempDbK, input.bandwidth)
  emit({ stage: 'carrier', rxPowerDbm, gOverTDb, cnrDb })

  const capacityBps = capacity(cnrDb, input.bandwidth)
  emit({ stage: 'capacity', capacityBps })

  return {
    pointing,
    eirpDb: eirpDbw,
    pathLossDb,
    rxDishGainDb,
    noiseFigureDb: {
      lnb: lnbNoiseFigureDb,
      coax: coax.noiseFigureDb,
      total: totalNoiseFigureDb,
    },
    noiseTempK: {
      effectiveInput: effectiveInputK,
      system: systemK,
    },
    rxPowerDbm,
    gOverTDb,
    cnrDb,
    capacityBps,
  }
}
