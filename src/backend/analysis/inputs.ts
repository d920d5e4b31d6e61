import { InvalidInputError } from '@backend/errors'
import type { Antenna, LinkBudgetInput, LnbNoise, RadarOptions, TransmitPower } from '@backend/types'
import { z } from 'zod'

const number = (message = 'is required and must be a number') =>
  z.coerce.number({ required_error: message, invalid_type_error: message }).finite(message)

const longitude = number().min(-180).max(180)
const latitude = number().min(-90).max(90)

export const linkBudgetArgsSchema = z.object({
  eirp: number().optional(),
  txPower: number().optional(),
  txDishSize: number().positive().optional(),
  txDishGain: number().optional(),
  freq: number().positive(),
  ifBw: number().positive(),
  rxDishSize: number().positive().optional(),
  rxDishGain: number().optional(),
  antennaNoiseTemp: number().nonnegative(),
  lnbNoiseFig: number().nonnegative().optional(),
  lnbNoiseTemp: number().nonnegative().optional(),
  lnbGain: number(),
  coaxLength: number().nonnegative(),
  rxNoiseFig: number().nonnegative(),
  satLong: longitude,
  rxLong: longitude,
  rxLat: latitude,
  rxHeight: number().default(0),
  radar: z.boolean().default(false),
  radarAlt: number().positive().optional(),
  radarCrossSection: number().positive().optional(),
  radarBistatic: z.boolean().default(false),
})

/** Raw option values, as parsed from the command line */
export type LinkBudgetArgs = z.input<typeof linkBudgetArgsSchema>

type ParsedArgs = z.output<typeof linkBudgetArgsSchema>

/**
 * Drop empty or blank option values so they count as not given. Coercion
 * would otherwise read them as 0.
 */
export function withoutBlankValues(raw: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(raw).map(([key, value]) => [key, typeof value === 'string' && value.trim() === '' ? undefined : value])
  )
}

export function toFlag(key: string): string {
  return `--${key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`
}

function exactlyOne(
  args: ParsedArgs,
  keys: [keyof ParsedArgs, keyof ParsedArgs],
  issues: string[]
): boolean {
  const given = keys.filter((key) => args[key] !== undefined)

  if (given.length === 1) return true

  const [first, second] = keys.map(toFlag)
  issues.push(
    given.length === 0
      ? `one of ${first} or ${second} is required`
      : `${first} and ${second} are mutually exclusive`
  )
  return false
}

function resolveAntenna(size: number | undefined, gain: number | undefined): Antenna | undefined {
  if (gain !== undefined) return { kind: 'dishGain', gainDb: gain }
  if (size !== undefined) return { kind: 'dishSize', diameter: size }
  return undefined
}

function resolveTransmit(args: ParsedArgs, issues: string[]): TransmitPower | undefined {
  if (!exactlyOne(args, ['eirp', 'txPower'], issues)) return undefined

  if (args.eirp !== undefined) {
    if (args.txDishSize !== undefined || args.txDishGain !== undefined) {
      issues.push('--tx-dish-size and --tx-dish-gain only apply with --tx-power')
    }
    return { kind: 'eirp', eirpDbw: args.eirp }
  }

  if (args.txPower === undefined || !exactlyOne(args, ['txDishSize', 'txDishGain'], issues)) {
    return undefined
  }

  const antenna = resolveAntenna(args.txDishSize, args.txDishGain)
  return antenna && { kind: 'txPower', txPowerDbw: args.txPower, antenna }
}

function resolveLnbNoise(args: ParsedArgs, issues: string[]): LnbNoise | undefined {
  if (!exactlyOne(args, ['lnbNoiseFig', 'lnbNoiseTemp'], issues)) return undefined

  if (args.lnbNoiseFig !== undefined) {
    return { kind: 'noiseFigure', noiseFigureDb: args.lnbNoiseFig }
  }
  if (args.lnbNoiseTemp !== undefined) {
    return { kind: 'noiseTemp', noiseTempK: args.lnbNoiseTemp }
  }
  return undefined
}

function resolveRadar(args: ParsedArgs, issues: string[]): RadarOptions | undefined {
  if (!args.radar) {
    if (args.radarBistatic) issues.push('--radar-bistatic requires --radar')
    return undefined
  }

  if (args.radarAlt === undefined) {
    issues.push('--radar-alt is required in radar mode (--radar)')
  }
  if (args.radarCrossSection === undefined) {
    issues.push('--radar-cross-section is required in radar mode (--radar)')
  }
  if (args.radarBistatic) {
    // TODO: accept the object-to-receiver distance once there is an option for it
    issues.push(
      '--radar-bistatic needs the distance from the radar object to the receiver, which cannot be given yet'
    )
  }

  if (args.radarAlt === undefined || args.radarCrossSection === undefined || args.radarBistatic) {
    return undefined
  }

  return { altitude: args.radarAlt, crossSection: args.radarCrossSection, bistatic: false }
}

/**
 * Validate raw options and resolve each mutually exclusive group (EIRP or Tx
 * power, dish size or gain, LNB noise figure or temperature) into the input
 * the orchestrator takes. Every problem found is reported at once.
 */
export function resolveLinkBudgetInput(raw: LinkBudgetArgs | Record<string, unknown>): LinkBudgetInput {
  const result = linkBudgetArgsSchema.safeParse(withoutBlankValues(raw))

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.map(String).map(toFlag).join('.')}: ${e.message}`)
    throw new InvalidInputError('Invalid link budget options', issues)
  }

  const args = result.data
  const issues: string[] = []

  const transmit = resolveTransmit(args, issues)
  const rxAntenna = exactlyOne(args, ['rxDishSize', 'rxDishGain'], issues)
    ? resolveAntenna(args.rxDishSize, args.rxDishGain)
    : undefined
  const lnbNoise = resolveLnbNoise(args, issues)
  const radar = resolveRadar(args, issues)

  if (issues.length > 0 || !transmit || !rxAntenna || !lnbNoise) {
    throw new InvalidInputError('Invalid link budget options', issues)
  }

  return {
    transmit,
    frequency: args.freq,
    bandwidth: args.ifBw,
    rxAntenna,
    antennaNoiseTempK: args.antennaNoiseTemp,
    lnb: { noise: lnbNoise, gainDb: args.lnbGain },
    coaxLengthFt: args.coaxLength,
    rxNoiseFigureDb: args.rxNoiseFig,
    satLongitude: args.satLong,
    rxLongitude: args.rxLong,
    rxLatitude: args.rxLat,
    rxHeight: args.rxHeight,
    radar,
  }
}
