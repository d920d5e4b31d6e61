import { describeLookAngles, toFlag, withoutBlankValues } from '@backend/analysis'
import { loadConfig } from '@backend/config/config'
import { InvalidInputError } from '@backend/errors'
import { GEOSTATIONARY_ALTITUDE_M } from '@backend/link-budget'
import { POINTING_MODELS, lookAngles } from '@backend/pointing'
import type { PointingModel } from '@backend/types'
import { logger } from '@backend/utils/logger'
import chalk from 'chalk'
import { z } from 'zod'
import { type OptionSpec, parseOptions } from '../args'

export const POINTING_OPTIONS: OptionSpec = {
  satLong: 'value',
  rxLong: 'value',
  rxLat: 'value',
  rxHeight: 'value',
  alt: 'value',
  model: 'value',
  json: 'flag',
}

const coordinate = z.coerce.number({
  required_error: 'is required and must be a number',
  invalid_type_error: 'is required and must be a number',
})

const pointingArgsSchema = z.object({
  satLong: coordinate.min(-180).max(180),
  rxLong: coordinate.min(-180).max(180),
  rxLat: coordinate.min(-90).max(90),
  rxHeight: coordinate.default(0),
  alt: coordinate.positive().default(GEOSTATIONARY_ALTITUDE_M),
})

export function parsePointingModel(value: string): PointingModel {
  const model = POINTING_MODELS.find((m) => m === value)
  if (!model) {
    throw new InvalidInputError(`Unknown pointing model '${value}' (expected ${POINTING_MODELS.join(' or ')})`)
  }
  return model
}

export function pointingCommand(args: string[]): void {
  const config = loadConfig()
  const { values, flags } = parseOptions(args, POINTING_OPTIONS)
  const { model, ...coordinates } = values

  const parsed = pointingArgsSchema.safeParse(withoutBlankValues(coordinates))
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.map(String).map(toFlag).join('.')}: ${e.message}`)
    throw new InvalidInputError('Invalid pointing options', issues)
  }

  const { satLong, rxLong, rxLat, rxHeight, alt } = parsed.data
  const pointingModel = model ? parsePointingModel(model) : config.pointingModel
  const angles = lookAngles(satLong, rxLong, rxLat, alt, pointingModel, rxHeight)

  // NaN (spherical azimuth directly below the satellite) prints as null
  if (flags.json === true || config.output === 'json') {
    console.log(
      JSON.stringify({
        elevation: angles.elevation,
        azimuth: angles.azimuth,
        slant_range: angles.slantRange,
      })
    )
    return
  }

  logger.setLevel(config.logLevel)
  console.log(chalk.bold.cyan(`\n  Look Angles (${pointingModel})\n`))
  for (const line of describeLookAngles(angles)) {
    logger.stage('pointing', line)
  }

  if (angles.elevation < 0) {
    logger.warn('Reflector is below the horizon', { elevation: angles.elevation })
  }
}
