import { analyzeLinkBudget, describeStage, resolveLinkBudgetInput, toJsonRecord } from '@backend/analysis'
import { loadConfig } from '@backend/config/config'
import type { BudgetStageEvent, PointingModel } from '@backend/types'
import { logger } from '@backend/utils/logger'
import chalk from 'chalk'
import { type OptionSpec, parseOptions } from '../args'
import { parsePointingModel } from './pointing'

export const BUDGET_OPTIONS: OptionSpec = {
  eirp: 'value',
  txPower: 'value',
  txDishSize: 'value',
  txDishGain: 'value',
  freq: 'value',
  ifBw: 'value',
  rxDishSize: 'value',
  rxDishGain: 'value',
  antennaNoiseTemp: 'value',
  lnbNoiseFig: 'value',
  lnbNoiseTemp: 'value',
  lnbGain: 'value',
  coaxLength: 'value',
  rxNoiseFig: 'value',
  satLong: 'value',
  rxLong: 'value',
  rxLat: 'value',
  rxHeight: 'value',
  radar: 'flag',
  radarAlt: 'value',
  radarCrossSection: 'value',
  radarBistatic: 'flag',
  model: 'value',
  json: 'flag',
}

export function budgetCommand(args: string[]): void {
  const config = loadConfig()
  const { values, flags } = parseOptions(args, BUDGET_OPTIONS)
  const { model, ...budgetValues } = values

  const pointingModel: PointingModel = model ? parsePointingModel(model) : config.pointingModel
  const json = flags.json === true || config.output === 'json'

  const input = resolveLinkBudgetInput({
    ...budgetValues,
    radar: flags.radar === true,
    radarBistatic: flags.radarBistatic === true,
  })

  // stdout carries the JSON record alone
  logger.setLevel(json ? 'silent' : config.logLevel)

  if (!json) {
    console.log(chalk.bold.cyan('\n  Link Budget\n'))
  }

  logger.debug(`Pointing model: ${pointingModel}`)

  const result = analyzeLinkBudget(input, {
    pointingModel,
    coax: config.coax,
    onStage: (event: BudgetStageEvent) => {
      for (const line of describeStage(event)) {
        logger.stage(event.stage, line)
      }
    },
  })

  if (result.pointing.elevation < 0) {
    logger.warn('Reflector is below the horizon', { elevation: result.pointing.elevation })
  }

  if (json) {
    console.log(JSON.stringify(toJsonRecord(result)))
  }
}
