import { dbToLinear, formatRate } from '@backend/link-budget/units'
import type { BudgetStageEvent, LinkBudgetResult, LookAngles } from '@backend/types'

const label = (name: string) => `${name}:`.padEnd(20)
const fixed = (value: number, width = 6) => value.toFixed(2).padStart(width)
const kilowatts = (dbw: number) => dbToLinear(dbw) / 1e3

export function describeLookAngles(angles: LookAngles): string[] {
  return [
    `${label('Elevation')}${fixed(angles.elevation)} degrees`,
    `${label('Azimuth')}${fixed(angles.azimuth)} degrees`,
    `${label('Distance')}${fixed(angles.slantRange / 1e3, 8)} km`,
  ]
}

/** Report lines for the quantities produced by one pipeline stage */
export function describeStage(event: BudgetStageEvent): string[] {
  switch (event.stage) {
    case 'pointing':
      return describeLookAngles(event.lookAngles)
    case 'txDishGain':
      return [`${label('Tx dish gain')}${fixed(event.gainDb)} dB`]
    case 'txPower':
      return [`${label('Tx Power')}${fixed(kilowatts(event.txPowerDbw))} kW`]
    case 'eirp':
      return [`${label('EIRP')}${fixed(event.eirpDbw)} dBW (${fixed(kilowatts(event.eirpDbw))} kW)`]
    case 'pathLoss':
      return [`${label('Path loss')}${fixed(event.pathLossDb)} dB`]
    case 'rxDishGain':
      return [`${label('Rx dish gain')}${fixed(event.gainDb)} dB`]
    case 'coax':
      return [
        `${label('Coax loss')}${fixed(event.lossDb)} dB`,
        `${label('Coax noise figure')}${fixed(event.noiseFigureDb)} dB`,
      ]
    case 'lnbNoiseFigure':
      return [`${label('LNB noise figure')}${fixed(event.noiseFigureDb)} dB`]
    case 'totalNoiseFigure':
      return [`${label('Rx noise figure')}${fixed(event.noiseFigureDb)} dB`]
    case 'noiseTemp':
      return [
        `${label('Antenna noise temp')}${fixed(event.antennaK)} K`,
        `${label('Input-noise temp')}${fixed(event.effectiveInputK)} K`,
        `${label('System noise temp')}${fixed(event.systemK)} K`,
      ]
    case 'carrier':
      return [
        `${label('Rx Power')}${fixed(event.rxPowerDbm)} dBm`,
        `${label('(G/T)')}${fixed(event.gOverTDb)} dB/K`,
        `${label('(C/N)')}${fixed(event.cnrDb)} dB`,
      ]
    case 'capacity':
      return [`${label('Capacity')}${formatRate(event.capacityBps)}`]
  }
}

/**
 * Snake-case record printed by `--json`. Quantities that are undefined for
 * the geometry (the spherical azimuth directly below the satellite) are NaN
 * and serialize as `null`.
 */
export interface LinkBudgetRecord {
  pointing: {
    elevation: number
    azimuth: number
    slant_range: number
  }
  eirp_db: number
  path_loss_db: number
  rx_dish_gain_db: number
  noise_fig_db: {
    lnb: number
    coax: number
    total: number
  }
  noise_temp_k: {
    effective_input: number
    system: number
  }
  cnr_db: number
  capacity_bps: number
}

export function toJsonRecord(result: LinkBudgetResult): LinkBudgetRecord {
  return {
    pointing: {
      elevation: result.pointing.elevation,
      azimuth: result.pointing.azimuth,
      slant_range: result.pointing.slantRange,
    },
    eirp_db: result.eirpDb,
    path_loss_db: result.pathLossDb,
    rx_dish_gain_db: result.rxDishGainDb,
    noise_fig_db: {
      lnb: result.noiseFigureDb.lnb,
      coax: result.noiseFigureDb.coax,
      total: result.noiseFigureDb.total,
    },
    noise_temp_k: {
      effective_input: result.noiseTempK.effectiveInput,
      system: result.noiseTempK.system,
    },
    cnr_db: result.cnrDb,
    capacity_bps: result.capacityBps,
  }
}
