import type { LinkBudgetArgs } from '@backend/analysis/inputs'
import type { LinkBudgetInput } from '@backend/types'

/** Ku-band DTH downlink received in Texas from a satellite at 95°W */
export const TEST_LINK: LinkBudgetInput = {
  transmit: { kind: 'eirp', eirpDbw: 50 },
  frequency: 12e9,
  bandwidth: 1e6,
  rxAntenna: { kind: 'dishGain', gainDb: 35 },
  antennaNoiseTempK: 30,
  lnb: {
    noise: { kind: 'noiseFigure', noiseFigureDb: 1 },
    gainDb: 55,
  },
  coaxLengthFt: 10,
  rxNoiseFigureDb: 8,
  satLongitude: -95,
  rxLongitude: -97,
  rxLatitude: 33,
}

/** Same link, as the strings a command line would carry */
export const TEST_LINK_ARGS = {
  eirp: 50,
  freq: 12e9,
  ifBw: 1e6,
  rxDishGain: 35,
  antennaNoiseTemp: 30,
  lnbNoiseFig: 1,
  lnbGain: 55,
  coaxLength: 10,
  rxNoiseFig: 8,
  satLong: -95,
  rxLong: -97,
  rxLat: 33,
} satisfies LinkBudgetArgs

/** Monostatic 23 cm radar pointed straight up at an object 1000 km above it */
export const TEST_RADAR_LINK: LinkBudgetInput = {
  transmit: { kind: 'eirp', eirpDbw: 60 },
  frequency: 1.296e9,
  bandwidth: 1e3,
  rxAntenna: { kind: 'dishGain', gainDb: 30 },
  antennaNoiseTempK: 50,
  lnb: {
    noise: { kind: 'noiseFigure', noiseFigureDb: 0.5 },
    gainDb: 20,
  },
  coaxLengthFt: 5,
  rxNoiseFigureDb: 6,
  satLongitude: 5,
  rxLongitude: 5,
  rxLatitude: 0,
  radar: { altitude: 1000e3, crossSection: 10, bistatic: false },
}

export function createTestLink(overrides: Partial<LinkBudgetInput> = {}): LinkBudgetInput {
  return { ...TEST_LINK, ...overrides }
}

export function toArgv(args: Record<string, string | number | boolean>): string[] {
  return Object.entries(args).flatMap(([key, value]) => {
    const flag = `--${key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`
    if (typeof value === 'boolean') return value ? [flag] : []
    return [flag, String(value)]
  })
}
